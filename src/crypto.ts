import bs58 from 'bs58';
import { randomBytes } from 'crypto';
import CryptoJS from 'crypto-js';
import secp256k1 from 'secp256k1';

import logger from './logger.js';
import { convertBigIntsToStrings } from './utils/bigint.js';

export interface KeyPair {
    pub: string;
    priv: string;
}

/**
 * SHA-256 (hex) of the JSON form of a message; bigint fields are hashed as decimal strings
 */
export function hashMessage(message: unknown): string {
    return CryptoJS.SHA256(JSON.stringify(convertBigIntsToStrings(message))).toString();
}

/**
 * Signs a hex hash with a base58 private key.
 * The signature is base58 of r || s || recovery id, so the signer can be recovered.
 */
export function signHash(hash: string, privKey: string): string {
    const sigObj = secp256k1.ecdsaSign(Buffer.from(hash, 'hex'), bs58.decode(privKey));
    const full = new Uint8Array(65);
    full.set(sigObj.signature, 0);
    full[64] = sigObj.recid;
    return bs58.encode(full);
}

/**
 * Recovers the base58 compressed public key (the account address) that produced a signature.
 * Returns null when the signature cannot be decoded or recovered.
 */
export function recoverSigner(hash: string, signature: string): string | null {
    try {
        const raw = bs58.decode(signature);
        if (raw.length !== 65) return null;
        const pub = secp256k1.ecdsaRecover(raw.subarray(0, 64), raw[64], Buffer.from(hash, 'hex'), true);
        return bs58.encode(pub);
    } catch (error) {
        logger.debug(`[crypto] Could not recover signer: ${error instanceof Error ? error.message : String(error)}`);
        return null;
    }
}

export function verifySignature(hash: string, signature: string, address: string): boolean {
    return recoverSigner(hash, signature) === address;
}

export function getNewKeyPair(): KeyPair {
    let privKey: Buffer;
    do {
        privKey = randomBytes(32);
    } while (!secp256k1.privateKeyVerify(privKey));
    const pubKey = secp256k1.publicKeyCreate(privKey, true);
    return {
        pub: bs58.encode(pubKey),
        priv: bs58.encode(privKey),
    };
}
