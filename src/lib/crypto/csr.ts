/**
 * In-process PKCS#10 generation
 *
 * Alternative to `certreq -new` for hosts where the request does not need a key
 * in the Windows key store. The template is not embedded in the request; it is
 * named at submission time via `-attrib CertificateTemplate:<name>`.
 */

import { Crypto } from '@peculiar/webcrypto';
import {
  cryptoProvider,
  KeyUsageFlags,
  KeyUsagesExtension,
  Pkcs10CertificateRequestGenerator,
} from '@peculiar/x509';
import type { RequestSpec } from '../types/request.js';

// Use Node's global WebCrypto if available, otherwise fall back to @peculiar/webcrypto
const provider: Crypto =
  globalThis.crypto && 'subtle' in globalThis.crypto ? (globalThis.crypto as Crypto) : new Crypto();

cryptoProvider.set(provider);

const HASH_NAMES = {
  sha256: 'SHA-256',
} as const satisfies Record<RequestSpec['hashAlgorithm'], string>;

const KEY_USAGE_FLAGS = {
  digitalSignature: KeyUsageFlags.digitalSignature,
} as const satisfies Record<RequestSpec['keyUsage'][number], KeyUsageFlags>;

export interface LoadTestCsr {
  /** Raw DER bytes of the request */
  der: Buffer;
  /** PEM text, accepted by `certreq -submit` */
  pem: string;
}

/** Create a signed PKCS#10 request matching the request's subject, key and usage. */
export async function createLoadTestCsr(spec: RequestSpec): Promise<LoadTestCsr> {
  const hash = HASH_NAMES[spec.hashAlgorithm];
  const signingAlgorithm = { name: 'RSASSA-PKCS1-v1_5', hash } as const;

  const keys = await provider.subtle.generateKey(
    {
      ...signingAlgorithm,
      modulusLength: spec.key.length,
      publicExponent: new Uint8Array([0x01, 0x00, 0x01]),
    },
    spec.key.exportable,
    ['sign', 'verify'],
  );

  const usages = spec.keyUsage.reduce((acc, usage) => acc | KEY_USAGE_FLAGS[usage], 0);

  const csr = await Pkcs10CertificateRequestGenerator.create({
    name: spec.subject,
    keys,
    signingAlgorithm,
    extensions: [new KeyUsagesExtension(usages, true)],
  });

  return {
    der: Buffer.from(csr.rawData),
    pem: csr.toString('pem'),
  };
}
