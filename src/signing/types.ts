import type { Logger } from '../types/logger.js';

/**
 * Mutable header mapping handed to the signer.
 * Keys are case-insensitive for canonicalization; insertion order is irrelevant.
 */
export type HeaderMap = Record<string, string>;

/**
 * Credential used for one signing call.
 *
 * Keys are optional because they usually come from the environment; the
 * signer refuses to run unless both are present and non-empty.
 */
export interface SigningCredential {
  accessKeyId?: string;
  secretAccessKey?: string;
  /**
   * Temporary credentials (STS, instance roles) also carry a session token,
   * sent and signed as X-Amz-Security-Token
   */
  sessionToken?: string;
  /**
   * Region code, e.g. 'us-east-1'
   */
  region: string;
  /**
   * Signing namespace of the target service, e.g. 'execute-api' or 'sagemaker'
   */
  service: string;
}

export interface SigningOptions {
  /**
   * Clock read once per signing call
   * @default () => new Date()
   */
  now?: () => Date;

  /**
   * Receives a warning when signing is refused for lack of credentials
   */
  logger?: Logger;
}

export interface SigningTimestamp {
  /** YYYYMMDDTHHMMSSZ */
  amzDate: string;
  /** YYYYMMDD */
  dateStamp: string;
}

export interface CanonicalHeaders {
  /** `name:value\n` per header, ascending by lowercased name */
  canonicalHeaders: string;
  /** Lowercased names joined with `;` */
  signedHeaders: string;
}

/**
 * Every intermediate value of a signing call
 */
export interface SigningContext extends SigningTimestamp, CanonicalHeaders {
  credentialScope: string;
  payloadHash: string;
  canonicalRequest: string;
  stringToSign: string;
  signature: string;
  authorization: string;
  /** Header map the signature covers, including Host, X-Amz-Date and Authorization */
  headers: HeaderMap;
}
