import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { SOURCE_EXTENSION, validateContractName, type ContractStore } from '@deployer/core';
import { listSources } from './fs-utils.js';

/** Rendered contracts, one `<ContractName>.sol` per deployment. Writes overwrite. */
export class FileContractStore implements ContractStore {
  constructor(readonly dir: string) {}

  async write(name: string, source: string): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(path.join(this.dir, `${validateContractName(name)}${SOURCE_EXTENSION}`), source, 'utf8');
  }

  list(): Promise<string[]> {
    return listSources(this.dir);
  }
}
