/**
 * AWS shared configuration files (~/.aws/credentials and ~/.aws/config),
 * the same files `aws configure` writes.
 */

import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import type { AwsCredentialIdentity, CredentialProvider } from './types.js';

export interface SharedFilesOptions {
  /**
   * Profile name. Defaults to AWS_PROFILE, then 'default'.
   */
  profile?: string;

  /**
   * Defaults to AWS_SHARED_CREDENTIALS_FILE, then ~/.aws/credentials
   */
  credentialsFile?: string;

  /**
   * Defaults to AWS_CONFIG_FILE, then ~/.aws/config
   */
  configFile?: string;

  env?: NodeJS.ProcessEnv;
}

type IniSection = Record<string, string>;
type IniData = Record<string, IniSection>;

/**
 * Minimal INI reader: `[section]` headers, `key = value` pairs,
 * `#` and `;` comment lines.
 */
export function parseIni(content: string): IniData {
  const data: IniData = {};
  let current: IniSection | undefined;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || line.startsWith(';')) continue;

    const section = line.match(/^\[([^\]]+)\]$/);
    if (section) {
      const name = section[1].trim();
      current = data[name] ?? {};
      data[name] = current;
      continue;
    }

    const eq = line.indexOf('=');
    if (eq > 0 && current) {
      current[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
    }
  }

  return data;
}

function readIni(path: string): IniData | undefined {
  try {
    return parseIni(readFileSync(path, 'utf-8'));
  } catch (error) {
    // A missing file just means this source is empty
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export function fromSharedFiles(options: SharedFilesOptions = {}): CredentialProvider {
  const env = options.env ?? process.env;

  return () => {
    const profile = options.profile || env['AWS_PROFILE'] || 'default';
    const credentialsFile = options.credentialsFile
      || env['AWS_SHARED_CREDENTIALS_FILE']
      || join(homedir(), '.aws', 'credentials');
    const configFile = options.configFile
      || env['AWS_CONFIG_FILE']
      || join(homedir(), '.aws', 'config');

    // Config file uses 'profile <name>' for named profiles, but 'default' for default
    const configSectionName = profile === 'default' ? 'default' : `profile ${profile}`;
    const configSection = readIni(configFile)?.[configSectionName];
    const credentialsSection = readIni(credentialsFile)?.[profile];

    const section = credentialsSection?.['aws_access_key_id'] ? credentialsSection : configSection;
    const accessKeyId = section?.['aws_access_key_id'];
    const secretAccessKey = section?.['aws_secret_access_key'];
    if (!accessKeyId || !secretAccessKey) {
      return undefined;
    }

    const identity: AwsCredentialIdentity = { accessKeyId, secretAccessKey };
    const sessionToken = section?.['aws_session_token'];
    if (sessionToken) identity.sessionToken = sessionToken;
    const region = configSection?.['region'] || credentialsSection?.['region'];
    if (region) identity.region = region;
    return identity;
  };
}
