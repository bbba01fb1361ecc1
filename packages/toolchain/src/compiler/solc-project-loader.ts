import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import solc from 'solc';
import { z } from 'zod';
import { Abi as AbiSchema } from 'abitype/zod';
import type { Hex } from 'viem';
import { pino } from 'pino';
import {
  CompilationError,
  SOURCE_EXTENSION,
  errorMessage,
  stripSourceExtension,
  type CompiledProject,
  type ContractArtifact,
  type ProjectLoader,
} from '@deployer/core';
import { isNotFound, listSources } from '../stores/fs-utils.js';

const logger = pino({ name: 'solc-project-loader', level: process.env.LOG_LEVEL || 'info' });

const BytecodeSchema = z
  .string()
  .regex(/^[0-9a-fA-F]*$/, 'bytecode must be hex')
  .transform((value): Hex => `0x${value}`);

const DiagnosticSchema = z.object({
  severity: z.string(),
  message: z.string(),
  formattedMessage: z.string().optional(),
});

const SolcOutputSchema = z.object({
  errors: z.array(DiagnosticSchema).optional(),
  contracts: z
    .record(
      z.record(
        z.object({
          abi: AbiSchema,
          evm: z.object({ bytecode: z.object({ object: BytecodeSchema }) }),
        })
      )
    )
    .optional(),
});

export interface SolcProjectLoaderOptions {
  contractsDir: string;
  optimizer?: { enabled: boolean; runs: number };
}

type SourceMap = Record<string, { content: string }>;

type CompileOutcome =
  | { ok: true; artifacts: ContractArtifact[] }
  | { ok: false; error: CompilationError };

/**
 * Compiles the `.sol` files in the contracts directory with solc-js
 * standard JSON. All files go through one run first; when that run fails,
 * each file is compiled on its own so a broken file only affects lookups
 * that land on it. Imports outside the directory are refused.
 */
export class SolcProjectLoader implements ProjectLoader {
  private readonly contractsDir: string;

  constructor(private readonly options: SolcProjectLoaderOptions) {
    this.contractsDir = path.resolve(options.contractsDir);
  }

  async load(): Promise<CompiledProject> {
    const names = await listSources(this.contractsDir);
    const sources: SourceMap = {};
    for (const name of names) {
      const sourceName = `${name}${SOURCE_EXTENSION}`;
      sources[sourceName] = { content: await readFile(path.join(this.contractsDir, sourceName), 'utf8') };
    }

    if (names.length === 0) {
      return createProject([], new Map());
    }

    const startedAt = Date.now();
    const combined = this.compile(sources);
    if (combined.ok) {
      logger.info(
        { sources: names.length, contracts: combined.artifacts.length, durationMs: Date.now() - startedAt },
        'Project compiled'
      );
      return createProject(combined.artifacts, new Map());
    }

    const artifacts: ContractArtifact[] = [];
    const failures = new Map<string, CompilationError>();
    for (const [sourceName, source] of Object.entries(sources)) {
      const outcome = this.compile({ [sourceName]: source });
      if (outcome.ok) {
        artifacts.push(...outcome.artifacts);
      } else {
        failures.set(stripSourceExtension(sourceName), outcome.error);
      }
    }

    logger.warn(
      { sources: names.length, failed: [...failures.keys()], durationMs: Date.now() - startedAt },
      'Project compiled with failing sources'
    );
    return createProject(artifacts, failures);
  }

  private compile(sources: SourceMap): CompileOutcome {
    const settings = {
      optimizer: this.options.optimizer ?? { enabled: true, runs: 200 },
      outputSelection: { '*': { '*': ['abi', 'evm.bytecode.object'] } },
    };
    const imported: SourceMap = {};
    const findImport = (importPath: string) => {
      const found = this.findImport(importPath);
      if ('contents' in found) {
        imported[importPath] = { content: found.contents };
      }
      return found;
    };

    const raw: unknown = JSON.parse(
      solc.compile(JSON.stringify({ language: 'Solidity', sources, settings }), { import: findImport })
    );
    const output = SolcOutputSchema.parse(raw);

    const diagnostics = output.errors ?? [];
    const errors = diagnostics.filter((diagnostic) => diagnostic.severity === 'error');
    if (errors.length > 0) {
      const messages = errors.map((diagnostic) => diagnostic.formattedMessage ?? diagnostic.message);
      return { ok: false, error: new CompilationError(`Compilation failed:\n${messages.join('\n')}`, messages) };
    }
    for (const warning of diagnostics) {
      logger.debug({ warning: warning.message }, 'Compiler warning');
    }

    // Imported units are inlined so the input is self-contained for explorers.
    const input = JSON.stringify({ language: 'Solidity', sources: { ...imported, ...sources }, settings });
    const compiler = { version: solc.version(), input };
    const artifacts: ContractArtifact[] = [];
    for (const [sourceName, contracts] of Object.entries(output.contracts ?? {})) {
      for (const [name, contract] of Object.entries(contracts)) {
        artifacts.push({ name, sourceName, abi: contract.abi, bytecode: contract.evm.bytecode.object, compiler });
      }
    }
    return { ok: true, artifacts };
  }

  private findImport(importPath: string): { contents: string } | { error: string } {
    const resolved = path.resolve(this.contractsDir, importPath);
    if (!resolved.startsWith(this.contractsDir + path.sep)) {
      return { error: `Import "${importPath}" is outside the contracts directory` };
    }
    try {
      return { contents: readFileSync(resolved, 'utf8') };
    } catch (error) {
      return { error: isNotFound(error) ? `File not found: ${importPath}` : errorMessage(error) };
    }
  }
}

function createProject(artifacts: ContractArtifact[], failures: Map<string, CompilationError>): CompiledProject {
  const byName = new Map<string, ContractArtifact>();
  const bySource = new Map<string, ContractArtifact[]>();

  for (const artifact of artifacts) {
    const storeName = stripSourceExtension(artifact.sourceName);
    const known = bySource.get(storeName) ?? [];
    // Per-file runs can emit the same imported unit more than once.
    if (!known.some((candidate) => candidate.name === artifact.name)) {
      bySource.set(storeName, [...known, artifact]);
    }

    // A contract in its own `<Name>.sol` wins over a same-named one elsewhere.
    const existing = byName.get(artifact.name);
    if (!existing || storeName === artifact.name) {
      byName.set(artifact.name, artifact);
    }
  }

  const failureOf = (sourceName: string): CompilationError | undefined => failures.get(sourceName);

  return {
    names: () => [...byName.keys()].sort(),
    get: (contractName) => {
      const artifact = byName.get(contractName);
      const failure = failureOf(contractName);
      if (!artifact && failure) {
        throw failure;
      }
      return artifact;
    },
    declaredIn: (sourceName) => {
      const failure = failureOf(sourceName);
      if (failure) {
        throw failure;
      }
      return bySource.get(sourceName) ?? [];
    },
    failedSources: () => [...failures.keys()].sort(),
    close: async () => {
      byName.clear();
      bySource.clear();
      failures.clear();
    },
  };
}
