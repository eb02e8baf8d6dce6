#!/usr/bin/env node
/**
 * Run Pipeline CLI
 *
 * Trains the credit default model and publishes it to a running hosting service.
 *
 * Usage:
 *   npm run pipeline -- --name credit-default --version 1.0 --swagger-out ./out/swagger.json
 *
 * Options:
 *   --data <path>          Dataset CSV (defaults to dataset.path from config)
 *   --name <name>          Service name (default: credit-default)
 *   --version <version>    Service version (default: 1.0)
 *   --save-model <path>    Write the trained model as JSON
 *   --swagger-out <path>   Write the service's Swagger document
 *   --update               Retrain on all rows and update the service in place
 *   --delete               Delete the service at the end
 *
 * @module RunPipelineCLI
 */

import { ConfigService } from '@creditops/config';
import { DeployClient } from '@creditops/deploy-client';
import { Logger } from '@creditops/utils';
import { runPipeline } from '../pipeline/credit-pipeline';

interface CLIArgs {
  data?: string;
  name: string;
  version: string;
  saveModel?: string;
  swaggerOut?: string;
  update: boolean;
  delete: boolean;
}

function printHelp() {
  console.log(`
Run Pipeline CLI - credit default scoring

Train, publish, invoke and optionally update or delete a credit default service.

Usage:
  npm run pipeline -- [options]

Options:
  --data <path>          Dataset CSV (defaults to dataset.path from config)
  --name <name>          Service name (default: credit-default)
  --version <version>    Service version (default: 1.0)
  --save-model <path>    Write the trained model as JSON
  --swagger-out <path>   Write the service's Swagger document
  --update               Retrain on all rows and update the service in place
  --delete               Delete the service at the end
  --help, -h             Show this help message

Environment Variables:
  NODE_ENV                  Selects config/<environment>.json
  CREDITOPS_CLIENT_BASE_URL Hosting service URL
  CREDITOPS_AUTH_USERNAME   Operator username
  CREDITOPS_AUTH_PASSWORD   Operator password

Examples:
  # Publish, then swap in a retrained model and clean up
  npm run pipeline -- --version 1.0 --update --delete
`);
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    console.error(`Error: ${flag} requires a value`);
    printHelp();
    process.exit(1);
  }
  return value;
}

function parseArgs(): CLIArgs {
  const args = process.argv.slice(2);
  const parsed: CLIArgs = { name: 'credit-default', version: '1.0', update: false, delete: false };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--data':
        parsed.data = takeValue(args, ++i, '--data');
        break;
      case '--name':
        parsed.name = takeValue(args, ++i, '--name');
        break;
      case '--version':
        parsed.version = takeValue(args, ++i, '--version');
        break;
      case '--save-model':
        parsed.saveModel = takeValue(args, ++i, '--save-model');
        break;
      case '--swagger-out':
        parsed.swaggerOut = takeValue(args, ++i, '--swagger-out');
        break;
      case '--update':
        parsed.update = true;
        break;
      case '--delete':
        parsed.delete = true;
        break;
      case '--help':
      case '-h':
        printHelp();
        process.exit(0);
      default:
        console.error(`Unknown option: ${args[i]}`);
        printHelp();
        process.exit(1);
    }
  }

  return parsed;
}

async function main() {
  const args = parseArgs();
  const logger = new Logger('pipeline');

  const config = await new ConfigService(logger.child('config')).load();
  logger.setLevel(config.core.logLevel);

  const client = new DeployClient({
    baseUrl: config.client.baseUrl,
    timeoutMs: config.client.timeoutMs,
    logger: logger.child('client'),
  });

  const result = await runPipeline({
    config,
    client,
    logger,
    serviceName: args.name,
    serviceVersion: args.version,
    dataPath: args.data,
    saveModelPath: args.saveModel,
    swaggerOutPath: args.swaggerOut,
    update: args.update,
    remove: args.delete,
  });

  console.log('\nPipeline complete');
  console.log(`  Service:   ${result.descriptor.name}@${result.descriptor.version}`);
  console.log(`  Accuracy:  ${result.metrics.accuracy.toFixed(3)}`);
  console.log(`  AUC:       ${result.metrics.auc.toFixed(3)}`);
  console.log(`  Sample:    ${JSON.stringify(result.prediction)}`);
  if (result.updated) {
    console.log(`  Revision:  ${result.updated.descriptor.revision}`);
    console.log(`  Rescored:  ${JSON.stringify(result.updated.prediction)}`);
  }
  if (result.deleted) {
    console.log('  Service deleted');
  }
}

main().catch((error) => {
  console.error('Pipeline failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
