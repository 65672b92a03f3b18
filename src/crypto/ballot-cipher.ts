/**
 * Ballot encryption
 *
 * Voters seal their choice to the election's X25519 public key; only the
 * holder of the election private key can open it at tally time. The core
 * stores and returns sealed ballots without ever decrypting them.
 *
 * Envelope: `v1.` + hex(ephemeralPublicKey(32) || nonce(12) || ciphertext || tag(16))
 * Key: HKDF-SHA256(shared secret, salt = ephemeral public key, info = "sealed-ballot/v1")
 * Cipher: AES-256-GCM with the election id as associated data.
 *
 * @module crypto/ballot-cipher
 */

import { gcm } from '@noble/ciphers/aes';
import { randomBytes } from '@noble/ciphers/webcrypto';
import { x25519 } from '@noble/curves/ed25519';
import { hkdf } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes } from '@noble/hashes/utils';

const ENVELOPE_PREFIX = 'v1.';
const KEY_INFO = new TextEncoder().encode('sealed-ballot/v1');
const PUBLIC_KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const MIN_ENVELOPE_BYTES = PUBLIC_KEY_LENGTH + NONCE_LENGTH + TAG_LENGTH;

/**
 * Election encryption key pair (hex-encoded)
 */
export interface ElectionKeyPair {
  publicKey: string;
  privateKey: string;
}

/**
 * Generate the key pair an election authority publishes and guards
 */
export function generateElectionKeyPair(): ElectionKeyPair {
  const privateKey = x25519.utils.randomPrivateKey();
  return {
    publicKey: bytesToHex(x25519.getPublicKey(privateKey)),
    privateKey: bytesToHex(privateKey),
  };
}

/**
 * Encrypt a choice for an election
 *
 * @param choice - Plaintext choice (candidate id, option label, ...)
 * @param publicKey - Election public key (hex)
 * @param electionId - Bound as associated data; the envelope will not open for another election
 */
export function sealChoice(choice: string, publicKey: string, electionId: string): string {
  const ephemeralPrivate = x25519.utils.randomPrivateKey();
  const ephemeralPublic = x25519.getPublicKey(ephemeralPrivate);
  const shared = x25519.getSharedSecret(ephemeralPrivate, hexToBytes(publicKey));
  const key = deriveKey(shared, ephemeralPublic);
  const nonce = randomBytes(NONCE_LENGTH);

  const sealed = gcm(key, nonce, associatedData(electionId)).encrypt(
    new TextEncoder().encode(choice)
  );

  const envelope = new Uint8Array(ephemeralPublic.length + nonce.length + sealed.length);
  envelope.set(ephemeralPublic, 0);
  envelope.set(nonce, ephemeralPublic.length);
  envelope.set(sealed, ephemeralPublic.length + nonce.length);

  return ENVELOPE_PREFIX + bytesToHex(envelope);
}

/**
 * Decrypt a sealed choice
 *
 * @throws Error if the envelope is malformed or does not authenticate
 */
export function openChoice(sealed: string, privateKey: string, electionId: string): string {
  const envelope = parseEnvelope(sealed);
  if (!envelope) {
    throw new Error('Malformed ballot envelope');
  }

  const ephemeralPublic = envelope.slice(0, PUBLIC_KEY_LENGTH);
  const nonce = envelope.slice(PUBLIC_KEY_LENGTH, PUBLIC_KEY_LENGTH + NONCE_LENGTH);
  const body = envelope.slice(PUBLIC_KEY_LENGTH + NONCE_LENGTH);

  const shared = x25519.getSharedSecret(hexToBytes(privateKey), ephemeralPublic);
  const key = deriveKey(shared, ephemeralPublic);

  try {
    const plaintext = gcm(key, nonce, associatedData(electionId)).decrypt(body);
    return new TextDecoder().decode(plaintext);
  } catch {
    throw new Error('Ballot decryption failed');
  }
}

/**
 * Check that a value is a hex-encoded X25519 public key
 */
export function isElectionPublicKey(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}

/**
 * Structural check the server can run without the private key
 */
export function isSealedChoice(value: string): boolean {
  return parseEnvelope(value) !== null;
}

function parseEnvelope(value: string): Uint8Array | null {
  if (!value.startsWith(ENVELOPE_PREFIX)) {
    return null;
  }
  const hex = value.slice(ENVELOPE_PREFIX.length);
  if (!/^[0-9a-f]*$/.test(hex) || hex.length % 2 !== 0) {
    return null;
  }
  const bytes = hexToBytes(hex);
  return bytes.length > MIN_ENVELOPE_BYTES ? bytes : null;
}

function deriveKey(shared: Uint8Array, ephemeralPublic: Uint8Array): Uint8Array {
  return hkdf(sha256, shared, ephemeralPublic, KEY_INFO, KEY_LENGTH);
}

function associatedData(electionId: string): Uint8Array {
  return new TextEncoder().encode(`election:${electionId}`);
}
