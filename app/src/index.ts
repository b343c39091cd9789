#!/usr/bin/env node
/**
 * Price Receiver - CLI entry point
 *
 * Reads a price update account posted by the receiver program and prints its
 * price once the verification level, feed id and age checks pass.
 *
 * Exit codes:
 * - 0 price printed
 * - 1 usage or configuration error
 * - 2 the price update was rejected (GetPriceError)
 * - 3 any other failure (RPC, missing or malformed account)
 */

import { Connection } from '@solana/web3.js';
import { parseCliArgs, displayUsage, resolveReaderConfig, ReaderConfig } from './utils/cli-parser';
import { initLogger, Logger } from './utils/logger';
import { PriceUpdateReader } from './solana/price-update-reader';
import { VerificationLevel } from './price-update/verification-level';
import { feedIdToHex } from './price-update/feed-id';
import { formatPrice, formatTimestamp } from './utils/formatting';
import { colorize } from './config/colors';
import { ConfigurationError, GetPriceError, Price } from './types';

async function readPrice(reader: PriceUpdateReader, config: ReaderConfig, logger: Logger): Promise<Price> {
  switch (config.mode) {
    case 'unchecked':
      logger.warn('--unchecked: the price is neither verified nor checked for staleness');
      return reader.getPriceUnchecked(config.account, config.feedId);
    case 'partial':
      logger.warn(
        `Accepting ${VerificationLevel.format(config.verificationLevel)} verification;`,
        'fewer guardians need to collude to forge this update'
      );
      return reader.getPriceNoOlderThan(
        config.account,
        config.maximumAge,
        config.feedId,
        config.verificationLevel
      );
    case 'full':
      return reader.getPriceNoOlderThan(config.account, config.maximumAge, config.feedId);
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<number> {
  const options = parseCliArgs(process.argv);

  if (options.help) {
    displayUsage();
    return 0;
  }

  let config: ReaderConfig;
  try {
    config = resolveReaderConfig(options);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`\n❌ ERROR: ${error.message}\n`);
      displayUsage();
      return 1;
    }
    throw error;
  }

  const logger = await initLogger({ logFile: config.logFile, verbose: config.verbose });
  logger.debug(`RPC: ${config.rpcUrl}`);

  const reader = new PriceUpdateReader(new Connection(config.rpcUrl, 'confirmed'), {
    programId: config.programId,
    logger,
  });

  try {
    const price = await readPrice(reader, config, logger);
    logger.info(`Feed:          ${feedIdToHex(config.feedId)}`);
    logger.info(`Price:         ${colorize(formatPrice(price), 'brightGreen')}`);
    logger.info(`Publish time:  ${formatTimestamp(price.publishTime)}`);
    return 0;
  } catch (error) {
    if (error instanceof GetPriceError) {
      logger.error(`Price rejected (${error.kind}): ${error.message}`);
      return 2;
    }
    logger.error(error instanceof Error ? error.message : String(error));
    return 3;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 3;
  });
