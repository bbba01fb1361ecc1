import type { Abi, AbiFunction, AbiParameter } from 'viem';
import { MethodNotFoundError } from '../errors/index.js';

function formatParameterType(param: AbiParameter): string {
  if (param.type.startsWith('tuple') && 'components' in param) {
    const suffix = param.type.slice('tuple'.length);
    return `(${param.components.map(formatParameterType).join(',')})${suffix}`;
  }
  return param.type;
}

/** Canonical signature, e.g. `transfer(address,uint256)`. */
export function functionSignature(fn: AbiFunction): string {
  return `${fn.name}(${fn.inputs.map(formatParameterType).join(',')})`;
}

export function listFunctions(abi: Abi): AbiFunction[] {
  return abi.filter((item): item is AbiFunction => item.type === 'function');
}

/**
 * Resolves a bare method name or a full signature against the ABI. Bare
 * names must be unambiguous; overloaded methods need their signature.
 */
export function resolveMethod(contractName: string, abi: Abi, method: string): AbiFunction {
  const functions = listFunctions(abi);
  const requested = method.replace(/\s+/g, '');

  if (requested.includes('(')) {
    const match = functions.find((fn) => functionSignature(fn) === requested);
    if (match) {
      return match;
    }
    const name = requested.slice(0, requested.indexOf('('));
    throw new MethodNotFoundError(
      contractName,
      method,
      functions.filter((fn) => fn.name === name).map(functionSignature)
    );
  }

  const candidates = functions.filter((fn) => fn.name === requested);
  if (candidates.length === 1) {
    return candidates[0];
  }
  throw new MethodNotFoundError(contractName, method, candidates.map(functionSignature));
}
