import { z } from 'zod';
import { isAddress, type Address } from 'viem';
import { InvalidAddressError, InvalidNameError } from '../errors/index.js';

export const SOURCE_EXTENSION = '.sol';

const MAX_NAME_LENGTH = 200;

export const FileNameSchema = z
  .string()
  .min(1, 'must not be empty')
  .max(MAX_NAME_LENGTH, `must be at most ${MAX_NAME_LENGTH} characters`)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*$/, 'may only contain letters, digits, "_", "-" and "."')
  .refine((value) => !value.includes('..'), { message: 'must not contain ".."' });

// Solidity identifier; doubles as the contract's file name.
export const ContractNameSchema = z
  .string()
  .min(1, 'must not be empty')
  .max(MAX_NAME_LENGTH, `must be at most ${MAX_NAME_LENGTH} characters`)
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be a valid Solidity identifier');

export const AddressSchema = z.string().refine((value) => isAddress(value), {
  message: 'Invalid address format',
});

function check(schema: z.ZodType<string>, value: string, label: string): string {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidNameError(`${label} "${value}" ${reason}`, value);
  }
  return result.data;
}

export function stripSourceExtension(name: string): string {
  return name.endsWith(SOURCE_EXTENSION) ? name.slice(0, -SOURCE_EXTENSION.length) : name;
}

/** Returns the template name without its `.sol` extension. */
export function validateTemplateName(name: string): string {
  return check(FileNameSchema, stripSourceExtension(name), 'Template name');
}

export function validateContractName(name: string): string {
  return check(ContractNameSchema, name, 'Contract name');
}

export function validateAccountName(name: string): string {
  return check(FileNameSchema, name, 'Account name');
}

export function validateAddress(address: string): Address {
  if (!isAddress(address)) {
    throw new InvalidAddressError(address);
  }
  return address;
}
