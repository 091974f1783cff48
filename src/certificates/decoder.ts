/**
 * Decoding of the password-protected PKCS#12 archives returned by the
 * issuance service into PEM material for a TLS Secret.
 */

import forge from 'node-forge';
import { CastError, DecodeError, errorMessage } from '../core/errors.js';

export interface TLSMaterial {
  /** PEM `CERTIFICATE` block of the leaf certificate */
  certificate: Buffer;
  /** PEM `RSA PRIVATE KEY` block (PKCS#1) */
  privateKey: Buffer;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

// PKCS#12 bag types (RFC 7292 section 4.2)
const KEY_BAG = '1.2.840.113549.1.12.10.1.1';
const SHROUDED_KEY_BAG = '1.2.840.113549.1.12.10.1.2';
const CERT_BAG = '1.2.840.113549.1.12.10.1.3';

/**
 * Decode standard, padded base64. Line breaks are ignored so wrapped input
 * decodes. Buffer.from silently skips invalid characters, so the alphabet and
 * padding are checked first.
 */
export function decodeBase64Strict(encoded: string): Buffer {
  const data = encoded.replace(/[\r\n]/g, '');
  if (!BASE64_PATTERN.test(data)) {
    const offset = data.search(/[^A-Za-z0-9+/=]|=[^=]/);
    throw new Error(`illegal base64 data at input byte ${offset === -1 ? data.length : offset}`);
  }
  if (data.length % 4 !== 0) {
    throw new Error(`illegal base64 data at input byte ${data.length - (data.length % 4)}`);
  }
  return Buffer.from(data, 'base64');
}

/**
 * Narrow a decoded private key to RSA. forge leaves `key` null for key
 * families it cannot read and represents ed25519 keys as raw bytes.
 */
export function requireRsaPrivateKey(
  key: forge.pki.PrivateKey | null | undefined
): forge.pki.rsa.PrivateKey {
  if (key === null || key === undefined || key instanceof Uint8Array) {
    throw new CastError('cannot cast to RSA private key', key ? 'ed25519' : undefined);
  }
  return key;
}

function readArchive(der: Buffer, password: string): forge.pkcs12.Pkcs12Pfx {
  const asn1 = forge.asn1.fromDer(forge.util.createBuffer(der.toString('binary')));
  return forge.pkcs12.pkcs12FromAsn1(asn1, password);
}

function bagsOfType(archive: forge.pkcs12.Pkcs12Pfx, bagType: string): forge.pkcs12.Bag[] {
  return archive.getBags({ bagType })[bagType] ?? [];
}

function sameModulus(certificate: forge.pki.Certificate, key: forge.pki.rsa.PrivateKey): boolean {
  const publicKey = certificate.publicKey;
  if (publicKey instanceof Uint8Array) {
    return false;
  }
  return publicKey.n.toString(16) === key.n.toString(16);
}

interface ArchiveContents {
  key: forge.pki.PrivateKey | null | undefined;
  certificates: forge.pki.Certificate[];
}

function readContents(der: Buffer, password: string): ArchiveContents {
  const archive = readArchive(der, password);

  const keyBags = [
    ...bagsOfType(archive, SHROUDED_KEY_BAG),
    ...bagsOfType(archive, KEY_BAG),
  ];
  const [keyBag] = keyBags;
  if (!keyBag) {
    throw new Error('no private key found');
  }

  const certificates: forge.pki.Certificate[] = [];
  for (const bag of bagsOfType(archive, CERT_BAG)) {
    if (bag.cert) {
      certificates.push(bag.cert);
    }
  }
  if (certificates.length === 0) {
    throw new Error('no certificates found');
  }

  return { key: keyBag.key, certificates };
}

/**
 * Decode a base64 PKCS#12 archive into the leaf certificate and its RSA
 * private key, both PEM encoded.
 *
 * @throws DecodeError on malformed base64, a malformed archive, a wrong
 * password, or an archive without key or certificate
 * @throws CastError when the private key is not RSA
 */
export function decodeArchive(data: string, password: string): TLSMaterial {
  let der: Buffer;
  try {
    der = decodeBase64Strict(data);
  } catch (error) {
    throw new DecodeError(`cannot decode base64-encoded PKCS#12 data: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let contents: ArchiveContents;
  try {
    contents = readContents(der, password);
  } catch (error) {
    throw new DecodeError(`cannot decode PKCS#12 data: ${errorMessage(error)}`, { cause: error });
  }

  const privateKey = requireRsaPrivateKey(contents.key);
  const leaf = contents.certificates.find((certificate) => sameModulus(certificate, privateKey));
  if (!leaf) {
    throw new DecodeError(
      'cannot decode PKCS#12 data: private key does not match any certificate'
    );
  }

  return {
    certificate: Buffer.from(forge.pki.certificateToPem(leaf)),
    privateKey: Buffer.from(forge.pki.privateKeyToPem(privateKey)),
  };
}
