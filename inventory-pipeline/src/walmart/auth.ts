/**
 * Walmart affiliate API request signing.
 *
 * Each request carries a signature over
 *   consumerId + "\n" + timestampMillis + "\n" + keyVersion + "\n"
 * made with the consumer's RSA private key (PKCS#1 v1.5, SHA-256).
 */

import { readFileSync } from 'fs';
import { createPrivateKey, sign, type KeyObject } from 'crypto';
import { describeError } from '../utils/logger.js';

export interface WalmartCredentials {
  consumerId: string;
  privateKeyPath: string;
  keyVersion: string;
}

/** Produces the signed headers for one request. */
export interface RequestSigner {
  getHeaders(timestampMs?: number): Record<string, string>;
}

export class WalmartCredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WalmartCredentialError';
  }
}

export function buildCanonicalString(consumerId: string, timestamp: string, keyVersion: string): string {
  return `${consumerId}\n${timestamp}\n${keyVersion}\n`;
}

function loadPrivateKey(path: string): KeyObject {
  let pem: string;
  try {
    pem = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new WalmartCredentialError(`[walmart/auth] Cannot read private key at ${path}: ${describeError(err)}`);
  }

  try {
    return createPrivateKey(pem);
  } catch (err) {
    throw new WalmartCredentialError(`[walmart/auth] Invalid private key in ${path}: ${describeError(err)}`);
  }
}

export class WalmartAuth implements RequestSigner {
  readonly consumerId: string;
  readonly keyVersion: string;
  private readonly privateKey: KeyObject;

  /**
   * @throws WalmartCredentialError when the key file is missing or not a private key
   */
  constructor(credentials: WalmartCredentials) {
    this.consumerId = credentials.consumerId;
    this.keyVersion = credentials.keyVersion;

    this.privateKey = loadPrivateKey(credentials.privateKeyPath);
  }

  signCanonical(canonical: string): string {
    return sign('sha256', Buffer.from(canonical, 'utf-8'), this.privateKey).toString('base64');
  }

  getHeaders(timestampMs: number = Date.now()): Record<string, string> {
    const timestamp = String(timestampMs);
    const canonical = buildCanonicalString(this.consumerId, timestamp, this.keyVersion);

    return {
      'WM_SEC.KEY_VERSION': this.keyVersion,
      'WM_CONSUMER.ID': this.consumerId,
      'WM_CONSUMER.INTIMESTAMP': timestamp,
      'WM_SEC.AUTH_SIGNATURE': this.signCanonical(canonical),
      Accept: 'application/json',
    };
  }
}
