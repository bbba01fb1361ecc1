import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { privateKeyToAccount } from 'viem/accounts';
import { KeystoreWallet } from './keystore-wallet.js';

const PLACEHOLDER_KEY = '0x0000000000000000000000000000000000000000000000000000000000000001';

describe('KeystoreWallet', () => {
  let dir: string;
  let wallet: KeystoreWallet;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'deployer-keystore-'));
    wallet = new KeystoreWallet(path.join(dir, 'keystore'), { scryptN: 1024 });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should list nothing before any account is saved', async () => {
    await expect(wallet.list()).resolves.toEqual([]);
  });

  it('should save an account and unlock it again', async () => {
    const generated = await wallet.generate('alice', 'test-pass');

    expect(generated.saved).toBe(true);
    await expect(wallet.list()).resolves.toEqual(['alice']);

    const loaded = await wallet.load('alice', 'test-pass');
    expect(loaded).toEqual(generated.identity);
  });

  it('should never write the private key in the clear', async () => {
    const generated = await wallet.generate('alice', 'test-pass', PLACEHOLDER_KEY);

    const stored = await readFile(path.join(dir, 'keystore', 'alice.json'), 'utf8');

    expect(stored.includes(generated.identity.privateKey.slice(2))).toBe(false);
  });

  it('should derive the address from an imported key', async () => {
    const generated = await wallet.generate('imported', 'test-pass', PLACEHOLDER_KEY.slice(2));

    expect(generated.identity.privateKey).toBe(PLACEHOLDER_KEY);
    expect(generated.identity.address).toBe(privateKeyToAccount(PLACEHOLDER_KEY).address);
  });

  it('should keep accounts without a passphrase in memory only', async () => {
    const generated = await wallet.generate('ephemeral');

    expect(generated.saved).toBe(false);
    await expect(wallet.list()).resolves.toEqual([]);
  });

  it('should reject a wrong passphrase', async () => {
    await wallet.generate('alice', 'test-pass');

    await expect(wallet.load('alice', 'wrong-pass')).rejects.toMatchObject({ code: 'ACCOUNT_ERROR' });
  });

  it('should report unknown accounts', async () => {
    await expect(wallet.load('bob', 'test-pass')).rejects.toMatchObject({
      code: 'ACCOUNT_ERROR',
      message: 'Account "bob" does not exist',
    });
  });

  it('should refuse to overwrite an existing keystore', async () => {
    await wallet.generate('alice', 'test-pass');

    await expect(wallet.generate('alice', 'other-pass')).rejects.toMatchObject({
      message: 'Account "alice" already exists',
    });
  });

  it('should reject malformed private keys', async () => {
    await expect(wallet.generate('alice', 'test-pass', '0x1234')).rejects.toMatchObject({
      code: 'ACCOUNT_ERROR',
      message: 'Private key must be 32 bytes of hex',
    });
  });

  it('should delete an account only with its passphrase', async () => {
    await wallet.generate('alice', 'test-pass');

    await expect(wallet.remove('alice', 'wrong-pass')).rejects.toMatchObject({ code: 'ACCOUNT_ERROR' });
    await expect(wallet.list()).resolves.toEqual(['alice']);

    await wallet.remove('alice', 'test-pass');
    await expect(wallet.list()).resolves.toEqual([]);
  });

  it('should validate account names', async () => {
    await expect(wallet.load('../alice', 'test-pass')).rejects.toMatchObject({ code: 'INVALID_NAME' });
  });
});
