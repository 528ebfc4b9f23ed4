#!/usr/bin/env node
import { program } from 'commander';
import { readFileSync } from 'node:fs';
import { createInterface } from 'node:readline';
import { loadConfig, loadEnvFile } from '../config.js';
import { isAuthMethod, AUTH_METHODS } from '../plugins/auth/index.js';
import { loggerPlugin } from '../plugins/logger.js';
import { consoleLogger, createLevelLogger } from '../types/logger.js';
import { ValidationError } from '../core/errors.js';
import colors from '../utils/colors.js';
import {
  formatError,
  handleEndpoints,
  handleSign,
  handleTest,
  handleTestAll,
  runShell,
  type CliContext,
} from './handler.js';

interface GlobalOptions {
  url?: string;
  env?: string | boolean;
  region?: string;
  service?: string;
  verbose?: boolean;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    consoleLogger.debug(`Cannot read package.json: ${error instanceof Error ? error.message : String(error)}`);
  }
  return '0.0.0';
}

/**
 * Load .env (the default path, or --env <path>), validate config, wire logging
 */
function createContext(options: GlobalOptions): CliContext {
  const envFile = loadEnvFile(typeof options.env === 'string' ? options.env : undefined);
  if (options.env !== undefined && !envFile.found) {
    console.log(colors.yellow(`Warning: No .env file found at ${envFile.path}`));
  }

  const config = loadConfig(process.env, {
    apiUrl: options.url,
    region: options.region,
    service: options.service,
    logLevel: options.verbose ? 'debug' : undefined,
  });
  const logger = createLevelLogger(consoleLogger, config.logLevel);

  return {
    config,
    logger,
    colors,
    print: (line) => console.log(line),
    plugins: options.verbose ? [loggerPlugin({ logger, level: 'debug', showHeaders: true, showBody: true })] : [],
  };
}

async function run(action: (ctx: CliContext) => Promise<number> | number): Promise<void> {
  let code: number;
  try {
    code = await action(createContext(program.opts<GlobalOptions>()));
  } catch (error) {
    formatError(error, colors).forEach((line) => console.error(line));
    code = 1;
  }
  process.exit(code);
}

async function startShell(ctx: CliContext): Promise<number> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt('\nQuestion: ');
  try {
    return await runShell(ctx, rl, () => rl.prompt());
  } finally {
    rl.close();
  }
}

/**
 * CLI Entry Point
 */
async function main() {
  program
    .name('sigprobe')
    .description('Probe an inference API with AWS SigV4 and API-key authentication')
    .version(readVersion())
    .option('-u, --url <url>', 'API URL (overrides API_URL)')
    .option('-e, --env [path]', 'Load .env file from current directory or specified path')
    .option('-r, --region <region>', 'AWS region (overrides AWS_REGION)')
    .option('-s, --service <service>', 'SigV4 service name (overrides SIGV4_SERVICE)')
    .option('-v, --verbose', 'Log requests and responses')
    .addHelpText('after', `
${colors.bold(colors.yellow('Examples:'))}
  ${colors.green('$ sigprobe test aws-iam')}
  ${colors.green('$ sigprobe testall --url https://abc123.execute-api.us-east-1.amazonaws.com/prod')}
  ${colors.green("$ sigprobe sign https://abc123.execute-api.us-east-1.amazonaws.com/prod --data '{\"query\":\"hi\"}'")}

${colors.bold(colors.yellow('Auth methods:'))}
  ${colors.cyan(AUTH_METHODS.join(', '))}
`)
    .action(() => run(startShell));

  program
    .command('test [auth-method]')
    .description('Send one probe with the given auth method')
    .action((method: string | undefined) => run((ctx) => {
      const authMethod = method ?? 'x-api-key';
      if (!isAuthMethod(authMethod)) {
        throw new ValidationError(`Unknown auth method "${authMethod}". Use one of: ${AUTH_METHODS.join(', ')}`, {
          field: 'authMethod',
          value: authMethod,
        });
      }
      return handleTest(ctx, authMethod);
    }));

  program
    .command('testall')
    .description('Probe with every auth method in turn')
    .action(() => run(handleTestAll));

  program
    .command('endpoints')
    .description('Find the path that accepts a SigV4-signed POST')
    .action(() => run(handleEndpoints));

  program
    .command('sign <url>')
    .description('Print the SigV4 headers for a POST to <url> without sending it')
    .option('-d, --data <body>', 'Request body to sign', '')
    .action((url: string, options: { data: string }) => run((ctx) => {
      handleSign(ctx, url, options.data);
      return 0;
    }));

  program
    .command('shell')
    .alias('interactive')
    .description('Ask questions interactively')
    .action(() => run(startShell));

  await program.parseAsync();
}

// Run the CLI
main().catch((error: unknown) => {
  console.error('CLI Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
