export interface AwsCredentialIdentity {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  /**
   * Region found next to the keys (environment or profile), if any
   */
  region?: string;
}

/**
 * Synchronous credential source. `undefined` means "nothing here", letting a
 * chain move on to the next source.
 *
 * Providers are invoked per request rather than cached at startup, so rotated
 * keys are picked up without restarting the process.
 */
export type CredentialProvider = () => AwsCredentialIdentity | undefined;
