import { z } from 'zod';
import { isAddress, isHex, type AbiFunction, type AbiParameter } from 'viem';
import { InvalidArgumentsError } from '../errors/index.js';
import { functionSignature } from './methods.js';
import type { EncodedArgument, MethodArgument } from '../types.js';

export const MethodArgumentSchema: z.ZodType<MethodArgument> = z.lazy(() =>
  z.discriminatedUnion('type', [
    z.object({ type: z.literal('int'), value: z.union([z.string(), z.number()]) }),
    z.object({ type: z.literal('string'), value: z.string() }),
    z.object({ type: z.literal('address'), value: z.string() }),
    z.object({ type: z.literal('bool'), value: z.boolean() }),
    z.object({ type: z.literal('bytes'), value: z.string() }),
    z.object({ type: z.literal('array'), value: z.array(MethodArgumentSchema) }),
  ])
);

export const MethodArgumentsSchema = z.array(MethodArgumentSchema);

interface ParameterShape {
  type: string;
  components?: readonly AbiParameter[];
}

const ARRAY_TYPE = /^(.*)\[(\d*)\]$/;
const INTEGER_TYPE = /^(u?)int(\d*)$/;
const FIXED_BYTES_TYPE = /^bytes(\d+)$/;
const INTEGER_LITERAL = /^(-?\d+|0x[0-9a-fA-F]+)$/;

class ArgumentMismatch extends Error {}

function mismatch(param: ParameterShape, arg: MethodArgument, expected: MethodArgument['type'], path: string) {
  return new ArgumentMismatch(`${path} expects ${param.type} (a "${expected}" value), got "${arg.type}"`);
}

function parseInteger(value: string | number, param: ParameterShape, path: string): bigint {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw new ArgumentMismatch(`${path} must be an integer, got ${value}`);
    }
    return BigInt(value);
  }
  if (!INTEGER_LITERAL.test(value)) {
    throw new ArgumentMismatch(`${path} must be an integer, got "${value}" for ${param.type}`);
  }
  return BigInt(value);
}

function checkIntegerRange(value: bigint, signed: boolean, bits: number, param: ParameterShape, path: string): void {
  const size = BigInt(bits);
  const min = signed ? -(1n << (size - 1n)) : 0n;
  const max = signed ? (1n << (size - 1n)) - 1n : (1n << size) - 1n;
  if (value < min || value > max) {
    throw new ArgumentMismatch(`${path} is out of range for ${param.type}`);
  }
}

function encodeValue(param: ParameterShape, arg: MethodArgument, path: string): EncodedArgument {
  const array = ARRAY_TYPE.exec(param.type);
  if (array) {
    if (arg.type !== 'array') {
      throw mismatch(param, arg, 'array', path);
    }
    if (array[2] !== '' && arg.value.length !== Number(array[2])) {
      throw new ArgumentMismatch(`${path} expects ${array[2]} items for ${param.type}, got ${arg.value.length}`);
    }
    const inner: ParameterShape = { type: array[1], components: param.components };
    return arg.value.map((item, index) => encodeValue(inner, item, `${path}[${index}]`));
  }

  if (param.type === 'tuple') {
    const components = param.components ?? [];
    if (arg.type !== 'array') {
      throw mismatch(param, arg, 'array', path);
    }
    if (arg.value.length !== components.length) {
      throw new ArgumentMismatch(`${path} expects ${components.length} tuple fields, got ${arg.value.length}`);
    }
    return arg.value.map((field, index) => encodeValue(components[index], field, `${path}.${index}`));
  }

  const integer = INTEGER_TYPE.exec(param.type);
  if (integer) {
    if (arg.type !== 'int') {
      throw mismatch(param, arg, 'int', path);
    }
    const value = parseInteger(arg.value, param, path);
    checkIntegerRange(value, integer[1] === '', integer[2] === '' ? 256 : Number(integer[2]), param, path);
    return value;
  }

  const fixedBytes = FIXED_BYTES_TYPE.exec(param.type);
  if (fixedBytes || param.type === 'bytes') {
    if (arg.type !== 'bytes') {
      throw mismatch(param, arg, 'bytes', path);
    }
    if (!isHex(arg.value, { strict: true }) || arg.value.length % 2 !== 0) {
      throw new ArgumentMismatch(`${path} must be 0x-prefixed hex with whole bytes`);
    }
    if (fixedBytes && arg.value.length !== 2 + Number(fixedBytes[1]) * 2) {
      throw new ArgumentMismatch(`${path} must be ${fixedBytes[1]} bytes for ${param.type}`);
    }
    return arg.value;
  }

  switch (param.type) {
    case 'address':
      if (arg.type !== 'address') {
        throw mismatch(param, arg, 'address', path);
      }
      if (!isAddress(arg.value)) {
        throw new ArgumentMismatch(`${path} is not a valid address: "${arg.value}"`);
      }
      return arg.value;
    case 'bool':
      if (arg.type !== 'bool') {
        throw mismatch(param, arg, 'bool', path);
      }
      return arg.value;
    case 'string':
      if (arg.type !== 'string') {
        throw mismatch(param, arg, 'string', path);
      }
      return arg.value;
    default:
      throw new ArgumentMismatch(`${path} has unsupported parameter type ${param.type}`);
  }
}

/**
 * Checks tagged arguments against the method's declared inputs and converts
 * them to the values the chain client encodes.
 */
export function encodeArguments(method: AbiFunction, args: readonly MethodArgument[]): EncodedArgument[] {
  const signature = functionSignature(method);
  if (args.length !== method.inputs.length) {
    throw new InvalidArgumentsError(
      `${signature} expects ${method.inputs.length} argument(s), got ${args.length}`,
      signature
    );
  }

  try {
    return method.inputs.map((input, index) =>
      encodeValue(input, args[index], `argument ${index}${input.name ? ` (${input.name})` : ''}`)
    );
  } catch (error) {
    if (error instanceof ArgumentMismatch) {
      throw new InvalidArgumentsError(`${signature}: ${error.message}`, signature);
    }
    throw error;
  }
}
