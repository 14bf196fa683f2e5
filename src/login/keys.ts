import { p256 } from "@noble/curves/p256";
import { sha256 } from "@noble/hashes/sha256";

export type KeyPair = Readonly<{
  /** Never serialized. */
  secretKey: Uint8Array;
  /** SEC1 encoded public key. */
  publicKey: Uint8Array;
}>;

// KeyProvider supplies the key material the handshake carries; the codec treats it as opaque bytes.
export type KeyProvider = {
  generateKeyPair(): KeyPair;
  /** Signs message and returns a DER encoded signature. */
  sign(secretKey: Uint8Array, message: Uint8Array): Uint8Array;
  verify(publicKey: Uint8Array, message: Uint8Array, signatureDer: Uint8Array): boolean;
  isValidPublicKey(publicKey: Uint8Array): boolean;
};

// p256Keys is the default provider: uncompressed SEC1 P-256 keys and ECDSA-SHA256 DER signatures.
export const p256Keys: KeyProvider = {
  generateKeyPair() {
    const secretKey = p256.utils.randomPrivateKey();
    return { secretKey, publicKey: p256.getPublicKey(secretKey, false) };
  },
  sign(secretKey, message) {
    return p256.sign(sha256(message), secretKey).toDERRawBytes();
  },
  verify(publicKey, message, signatureDer) {
    try {
      return p256.verify(signatureDer, sha256(message), publicKey);
    } catch {
      // Malformed DER or key bytes.
      return false;
    }
  },
  isValidPublicKey(publicKey) {
    try {
      p256.ProjectivePoint.fromHex(publicKey).assertValidity();
      return true;
    } catch {
      return false;
    }
  }
};
