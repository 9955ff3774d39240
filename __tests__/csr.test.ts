import { describe, test, expect } from '@jest/globals';
import { createPublicKey } from 'crypto';
import { KeyUsageFlags, KeyUsagesExtension, Pkcs10CertificateRequest } from '@peculiar/x509';
import { buildRequestSpec, createLoadTestCsr } from '../src/index.js';

describe('createLoadTestCsr', () => {
  const spec = buildRequestSpec('WebServer', 'csr-test');

  test('creates a signed request for the load test subject', async () => {
    const { pem, der } = await createLoadTestCsr(spec);
    const csr = new Pkcs10CertificateRequest(pem);

    expect(csr.subject).toBe('CN=LoadTestCert-csr-test');
    expect(await csr.verify()).toBe(true);
    expect(Buffer.from(csr.rawData).equals(der)).toBe(true);
  });

  test('marks the key for digital signature only', async () => {
    const { pem } = await createLoadTestCsr(spec);
    const csr = new Pkcs10CertificateRequest(pem);
    const usage = csr.extensions.find(
      (ext): ext is KeyUsagesExtension => ext instanceof KeyUsagesExtension,
    );

    expect(usage).toBeInstanceOf(KeyUsagesExtension);
    expect(usage?.usages).toBe(KeyUsageFlags.digitalSignature);
    expect(usage?.critical).toBe(true);
  });

  test('uses a 2048-bit RSA key', async () => {
    const { pem } = await createLoadTestCsr(spec);
    const csr = new Pkcs10CertificateRequest(pem);
    const key = createPublicKey({
      key: Buffer.from(csr.publicKey.rawData),
      format: 'der',
      type: 'spki',
    });

    expect(key.asymmetricKeyType).toBe('rsa');
    expect(key.asymmetricKeyDetails?.modulusLength).toBe(2048);
  });
});
