import { mkdir, readdir, readFile, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { decryptKeystoreJson, encryptKeystoreJson } from 'ethers';
import { isHex, type Hex } from 'viem';
import { generatePrivateKey, privateKeyToAccount } from 'viem/accounts';
import { pino } from 'pino';
import {
  AccountError,
  errorMessage,
  validateAccountName,
  type GeneratedAccount,
  type SigningIdentity,
  type Wallet,
} from '@deployer/core';
import { isNotFound } from '../stores/fs-utils.js';

const logger = pino({ name: 'keystore-wallet', level: process.env.LOG_LEVEL || 'info' });

const KEYSTORE_EXTENSION = '.json';

export interface KeystoreWalletOptions {
  /** scrypt cost parameter for new keystores; must be a power of two. */
  scryptN?: number;
}

function toPrivateKey(value: string): Hex {
  const candidate = value.startsWith('0x') ? value : `0x${value}`;
  if (!isHex(candidate, { strict: true }) || candidate.length !== 66) {
    throw new AccountError('Private key must be 32 bytes of hex');
  }
  return candidate;
}

/**
 * Accounts live as encrypted JSON keystores (`<name>.json`), one per file.
 * Keys are decrypted only on load and never written in the clear.
 */
export class KeystoreWallet implements Wallet {
  constructor(
    readonly dir: string,
    private readonly options: KeystoreWalletOptions = {}
  ) {}

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(KEYSTORE_EXTENSION))
      .map((entry) => entry.slice(0, -KEYSTORE_EXTENSION.length))
      .sort();
  }

  async load(name: string, passphrase: string): Promise<SigningIdentity> {
    const accountName = validateAccountName(name);

    let json: string;
    try {
      json = await readFile(this.pathOf(accountName), 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new AccountError(`Account "${accountName}" does not exist`, accountName);
      }
      throw error;
    }

    let privateKey: Hex;
    try {
      const decrypted = await decryptKeystoreJson(json, passphrase);
      privateKey = toPrivateKey(decrypted.privateKey);
    } catch (error) {
      throw new AccountError(`Unable to unlock account "${accountName}": ${errorMessage(error)}`, accountName, error);
    }

    const account = privateKeyToAccount(privateKey);
    logger.info({ account: accountName, address: account.address }, 'Account loaded');
    return { name: accountName, address: account.address, privateKey };
  }

  /**
   * Creates an account from `privateKey`, or a fresh random key. It is only
   * written to disk when a passphrase is given.
   */
  async generate(name: string, passphrase?: string, privateKey?: string): Promise<GeneratedAccount> {
    const accountName = validateAccountName(name);
    const key = privateKey ? toPrivateKey(privateKey) : generatePrivateKey();
    const account = privateKeyToAccount(key);
    const identity: SigningIdentity = { name: accountName, address: account.address, privateKey: key };

    if (!passphrase) {
      logger.info({ account: accountName, address: account.address }, 'Account created without keystore');
      return { identity, saved: false };
    }

    const json = await encryptKeystoreJson({ address: account.address, privateKey: key }, passphrase, {
      ...(this.options.scryptN ? { scrypt: { N: this.options.scryptN } } : {}),
    });
    await mkdir(this.dir, { recursive: true });
    try {
      await writeFile(this.pathOf(accountName), json, { encoding: 'utf8', flag: 'wx', mode: 0o600 });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        throw new AccountError(`Account "${accountName}" already exists`, accountName);
      }
      throw error;
    }

    logger.info({ account: accountName, address: account.address }, 'Account saved');
    return { identity, saved: true };
  }

  /** The passphrase must unlock the keystore before it is deleted. */
  async remove(name: string, passphrase: string): Promise<void> {
    const identity = await this.load(name, passphrase);
    await unlink(this.pathOf(identity.name));
    logger.info({ account: identity.name }, 'Account deleted');
  }

  private pathOf(accountName: string): string {
    return path.join(this.dir, `${accountName}${KEYSTORE_EXTENSION}`);
  }
}
