import ora from 'ora';
import { describeConfig, type ProbeConfig } from '../config.js';
import { ProbeError, HttpError } from '../core/errors.js';
import { defaultCredentialProvider, resolveSigningCredential } from '../credentials/providers.js';
import type { CredentialProvider } from '../credentials/types.js';
import { sign } from '../signing/sigv4.js';
import type { HeaderMap } from '../signing/types.js';
import { ask, discoverEndpoints, probe, probeAll, type ProbeOptions, type ProbeResult } from '../probe/index.js';
import type { AuthMethod } from '../plugins/auth/index.js';
import type { Plugin, Transport } from '../types/index.js';
import type { Logger } from '../types/logger.js';
import type { Colors } from '../utils/colors.js';

export interface Spinner {
  succeed(text?: string): unknown;
  fail(text?: string): unknown;
  stop(): unknown;
}

export interface CliContext {
  config: ProbeConfig;
  logger: Logger;
  colors: Colors;
  print: (line: string) => void;
  transport?: Transport;
  credentials?: CredentialProvider;
  plugins?: Plugin[];
  spinner?: (text: string) => Spinner;
  now?: () => Date;
}

const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

function startSpinner(ctx: CliContext, text: string): Spinner {
  if (ctx.spinner) return ctx.spinner(text);
  return ora({ text, color: 'cyan', spinner: 'dots' }).start();
}

function probeOptions(ctx: CliContext): ProbeOptions {
  return {
    transport: ctx.transport,
    logger: ctx.logger,
    credentials: ctx.credentials,
    plugins: ctx.plugins,
    now: ctx.now,
  };
}

function pretty(result: ProbeResult): string {
  return result.json !== undefined ? JSON.stringify(result.json, null, 2) : result.body;
}

/**
 * Human-readable lines for one probe, without the leading URL
 */
export function formatProbeResult(result: ProbeResult, colors: Colors): string[] {
  switch (result.outcome) {
    case 'failed':
      return [colors.red(`Request failed: ${result.error ?? 'unknown error'}`)];
    case 'unauthenticated':
      return [colors.red(`Cannot authenticate: ${result.error ?? 'no credentials'}`)];
    case 'success':
      return [`Status Code: ${colors.green(result.status)}`, `Response: ${pretty(result)}`];
    case 'unauthorized':
      return [
        `Status Code: ${colors.red(result.status)}`,
        `Authentication Error: ${result.body}`,
        colors.gray('Hint: check API_KEY in the .env file'),
      ];
    case 'forbidden':
      return [
        `Status Code: ${colors.red(result.status)}`,
        `Forbidden: ${result.body}`,
        colors.gray('Hint: the API may need a different auth method or a valid API key'),
      ];
    case 'not-found':
      return [`Status Code: ${colors.yellow(result.status)}`, `Not found: ${result.body}`];
    case 'method-not-allowed':
      return [`Status Code: ${colors.yellow(result.status)}`, `Method not allowed: ${result.body}`];
    case 'error':
      return [`Status Code: ${colors.red(result.status)}`, `Error ${result.status}: ${result.body}`];
  }
}

export function formatConfig(config: ProbeConfig, colors: Colors): string[] {
  return [colors.bold('Configuration:'), ...describeConfig(config).map((line) => `  ${line}`)];
}

/**
 * `sigprobe test [auth-method]`. Exit code 1 when the request could not be
 * authenticated at all.
 */
export async function handleTest(ctx: CliContext, method: AuthMethod): Promise<number> {
  const { colors, print } = ctx;
  print(`Testing API: ${colors.cyan(ctx.config.apiUrl)} (${method})`);

  const spinner = startSpinner(ctx, `POST ${ctx.config.apiUrl}`);
  const result = await probe(ctx.config, method, probeOptions(ctx));
  if (result.ok) {
    spinner.succeed(`${result.status} in ${result.durationMs}ms`);
  } else {
    spinner.fail(result.status ? `${result.status} in ${result.durationMs}ms` : 'No response');
  }

  formatProbeResult(result, colors).forEach(print);
  print('');
  formatConfig(ctx.config, colors).forEach(print);

  return result.outcome === 'unauthenticated' ? 1 : 0;
}

export async function handleTestAll(ctx: CliContext): Promise<number> {
  const { colors, print } = ctx;
  print(`Testing API: ${colors.cyan(ctx.config.apiUrl)} with every auth method`);

  const results = await probeAll(ctx.config, probeOptions(ctx));
  for (const result of results) {
    print('');
    print(colors.bold(`Auth method: ${result.authMethod}`));
    formatProbeResult(result, colors).forEach(print);
  }

  print('');
  print(colors.bold('Summary:'));
  for (const result of results) {
    const mark = result.outcome === 'success' ? colors.green('✓') : colors.red('✖');
    print(`  ${mark} ${result.authMethod}: ${result.status || '-'} ${result.outcome}`);
  }
  return 0;
}

export async function handleEndpoints(ctx: CliContext): Promise<number> {
  const { colors, print } = ctx;
  print('Testing endpoints with AWS IAM authentication...');

  const { results, workingPath } = await discoverEndpoints(ctx.config, probeOptions(ctx));
  for (const result of results) {
    print('');
    print(`Endpoint: ${colors.cyan(result.url)}`);
    formatProbeResult(result, colors).forEach(print);
  }

  print('');
  if (workingPath !== undefined) {
    print(colors.green(`Working endpoint found: ${workingPath}`));
    return 0;
  }
  print(colors.yellow('No endpoint answered 200'));
  return results.some((result) => result.outcome === 'unauthenticated') ? 1 : 0;
}

/**
 * Print the headers a signed POST to `url` would carry. Nothing is sent.
 */
export function handleSign(ctx: CliContext, url: string, data = ''): HeaderMap {
  const provider = ctx.credentials ?? defaultCredentialProvider({ logger: ctx.logger });
  const credential = resolveSigningCredential(provider, { region: ctx.config.region, service: ctx.config.service });

  const headers = sign('POST', url, data, { 'Content-Type': 'application/json' }, credential, {
    now: ctx.now,
    logger: ctx.logger,
  });

  for (const [name, value] of Object.entries(headers)) {
    ctx.print(`${ctx.colors.blue(name)}: ${value}`);
  }
  return headers;
}

async function describeFailure(error: unknown): Promise<string> {
  if (error instanceof HttpError && error.response) {
    return `Error ${error.status}: ${await error.response.text()}`;
  }
  return `Request failed: ${error instanceof Error ? error.message : String(error)}`;
}

/**
 * Question loop over `lines`. `quit`, `exit` and `q` leave; blank lines are skipped.
 */
export async function runShell(ctx: CliContext, lines: AsyncIterable<string>, prompt: () => void = () => {}): Promise<number> {
  const { colors, print } = ctx;
  print(colors.bold('Inference API shell'));
  print("Enter your question, or 'quit' to exit");
  prompt();

  for await (const raw of lines) {
    const question = raw.trim();
    if (EXIT_WORDS.has(question.toLowerCase())) {
      break;
    }
    if (question) {
      try {
        const answer = await ask(ctx.config, question, probeOptions(ctx));
        print(`${colors.green('Response:')} ${answer}`);
      } catch (error) {
        if (!(error instanceof Error)) throw error;
        print(colors.red(await describeFailure(error)));
      }
    }
    prompt();
  }

  print('Goodbye!');
  return 0;
}

/**
 * Message and suggestions for an error that ends the process
 */
export function formatError(error: unknown, colors: Colors): string[] {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [colors.red(`Error: ${message}`)];
  if (error instanceof ProbeError) {
    lines.push(...error.suggestions.map((s) => colors.gray(`  - ${s}`)));
  }
  return lines;
}
