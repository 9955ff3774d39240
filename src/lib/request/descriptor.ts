/**
 * certreq INF descriptor rendering
 *
 * The descriptor is the ephemeral input to `certreq -new`; it is written beside
 * the request blob and removed once the blob exists (or creation failed).
 */

import { DEFAULT_PROVIDER_NAME } from '../constants/defaults.js';
import type { RequestSpec } from '../types/request.js';

export interface DescriptorOptions {
  /** Store the generated key in the machine store (needs elevation) */
  machineKeySet?: boolean;
  /** CSP used by certreq to generate the key */
  providerName?: string;
}

// CERT_DIGITAL_SIGNATURE_KEY_USAGE
const KEY_USAGE_FLAGS: Record<RequestSpec['keyUsage'][number], number> = {
  digitalSignature: 0x80,
};

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/** Combined KeyUsage bit mask in certreq's hex notation. */
export function keyUsageMask(spec: RequestSpec): string {
  const mask = spec.keyUsage.reduce((acc, usage) => acc | KEY_USAGE_FLAGS[usage], 0);
  return `0x${mask.toString(16)}`;
}

/** Render the INF descriptor for one request spec (CRLF line endings). */
export function renderRequestDescriptor(spec: RequestSpec, opts: DescriptorOptions = {}): string {
  const machineKeySet = opts.machineKeySet ?? true;
  const providerName = opts.providerName ?? DEFAULT_PROVIDER_NAME;

  return [
    '[Version]',
    'Signature="$Windows NT$"',
    '',
    '[NewRequest]',
    `Subject = ${quote(spec.subject)}`,
    `KeyLength = ${spec.key.length}`,
    `KeyAlgorithm = ${spec.key.algorithm}`,
    `HashAlgorithm = ${spec.hashAlgorithm}`,
    `KeyUsage = ${keyUsageMask(spec)}`,
    `Exportable = ${spec.key.exportable ? 'TRUE' : 'FALSE'}`,
    `MachineKeySet = ${machineKeySet ? 'TRUE' : 'FALSE'}`,
    'RequestType = PKCS10',
    `ProviderName = ${quote(providerName)}`,
    '',
    '[RequestAttributes]',
    `CertificateTemplate = ${quote(spec.templateName)}`,
    '',
  ].join('\r\n');
}
