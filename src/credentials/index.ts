export type { AwsCredentialIdentity, CredentialProvider } from './types.js';
export {
  fromStatic,
  fromEnv,
  chain,
  defaultCredentialProvider,
  resolveSigningCredential,
  describeCredential,
} from './providers.js';
export { fromSharedFiles, parseIni, type SharedFilesOptions } from './shared-files.js';
