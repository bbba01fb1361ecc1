export type DeployerErrorCode =
  | 'INVALID_NAME'
  | 'INVALID_ADDRESS'
  | 'INVALID_ARGUMENTS'
  | 'TEMPLATE_NOT_FOUND'
  | 'TEMPLATE_EXISTS'
  | 'INCOMPLETE_TEMPLATE'
  | 'CONTRACT_NAME_MISMATCH'
  | 'CONTRACT_NOT_FOUND'
  | 'METHOD_NOT_FOUND'
  | 'COMPILATION_FAILED'
  | 'NO_ACTIVE_ACCOUNT'
  | 'NO_ACTIVE_NETWORK'
  | 'CONNECTION_FAILED'
  | 'ACCOUNT_ERROR'
  | 'DEPLOYMENT_SUBMISSION_FAILED'
  | 'INTERACTION_SUBMISSION_FAILED'
  | 'INTERNAL_ERROR';

export interface DeployerErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class DeployerError extends Error {
  public readonly code: DeployerErrorCode;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  constructor(message: string, code: DeployerErrorCode, options: DeployerErrorOptions = {}) {
    super(message);
    this.name = 'DeployerError';
    this.code = code;
    this.context = options.context;
    this.cause = options.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

export class InvalidNameError extends DeployerError {
  constructor(message: string, public readonly value?: string) {
    super(message, 'INVALID_NAME', { context: { value } });
    this.name = 'InvalidNameError';
  }
}

export class InvalidAddressError extends DeployerError {
  constructor(public readonly address: string) {
    super(`"${address}" is not a valid contract address`, 'INVALID_ADDRESS', { context: { address } });
    this.name = 'InvalidAddressError';
  }
}

export class InvalidArgumentsError extends DeployerError {
  constructor(message: string, public readonly method?: string) {
    super(message, 'INVALID_ARGUMENTS', { context: { method } });
    this.name = 'InvalidArgumentsError';
  }
}

export class TemplateNotFoundError extends DeployerError {
  constructor(public readonly templateName: string) {
    super(`Template "${templateName}" is not available`, 'TEMPLATE_NOT_FOUND', { context: { templateName } });
    this.name = 'TemplateNotFoundError';
  }
}

export class TemplateExistsError extends DeployerError {
  constructor(public readonly templateName: string) {
    super(`Template "${templateName}" already exists`, 'TEMPLATE_EXISTS', { context: { templateName } });
    this.name = 'TemplateExistsError';
  }
}

export class IncompleteTemplateError extends DeployerError {
  constructor(public readonly placeholders: string[]) {
    super(
      `Template parameters missing for placeholders: ${placeholders.join(', ')}`,
      'INCOMPLETE_TEMPLATE',
      { context: { placeholders } }
    );
    this.name = 'IncompleteTemplateError';
  }
}

export class ContractNameMismatchError extends DeployerError {
  constructor(public readonly contractName: string, public readonly declared: string[]) {
    const found = declared.length > 0 ? declared.join(', ') : 'none';
    super(
      `Contract "${contractName}" was not found in the rendered source (declared: ${found}). ` +
        'Please make sure that the contract name declared in the template is the same as contract_name.',
      'CONTRACT_NAME_MISMATCH',
      { context: { contractName, declared } }
    );
    this.name = 'ContractNameMismatchError';
  }
}

export class ContractNotFoundError extends DeployerError {
  constructor(public readonly contractName: string) {
    super(`Contract "${contractName}" is not part of the compiled project`, 'CONTRACT_NOT_FOUND', {
      context: { contractName },
    });
    this.name = 'ContractNotFoundError';
  }
}

export class MethodNotFoundError extends DeployerError {
  constructor(
    public readonly contractName: string,
    public readonly method: string,
    public readonly candidates: string[] = []
  ) {
    const hint = candidates.length > 0 ? ` Use one of: ${candidates.join(', ')}` : '';
    super(`Method "${method}" cannot be resolved on contract "${contractName}".${hint}`, 'METHOD_NOT_FOUND', {
      context: { contractName, method, candidates },
    });
    this.name = 'MethodNotFoundError';
  }
}

export class CompilationError extends DeployerError {
  constructor(message: string, public readonly diagnostics: string[] = []) {
    super(message, 'COMPILATION_FAILED', { context: { diagnostics } });
    this.name = 'CompilationError';
  }
}

export class NoActiveAccountError extends DeployerError {
  constructor() {
    super('No active account. Set one with /accounts/set_active before sending transactions', 'NO_ACTIVE_ACCOUNT');
    this.name = 'NoActiveAccountError';
  }
}

export class NoActiveNetworkError extends DeployerError {
  constructor() {
    super('Not connected to any network. Connect with /network/set before sending transactions', 'NO_ACTIVE_NETWORK');
    this.name = 'NoActiveNetworkError';
  }
}

export class ConnectionError extends DeployerError {
  constructor(public readonly network: string, options: { reason?: string; cause?: unknown } = {}) {
    const reason = options.reason ? `: ${options.reason}` : '';
    super(`Unable to connect to network "${network}"${reason}`, 'CONNECTION_FAILED', {
      context: { network },
      cause: options.cause,
    });
    this.name = 'ConnectionError';
  }
}

export class AccountError extends DeployerError {
  constructor(message: string, public readonly accountName?: string, cause?: unknown) {
    super(message, 'ACCOUNT_ERROR', { context: { accountName }, cause });
    this.name = 'AccountError';
  }
}

export class DeploymentSubmissionError extends DeployerError {
  constructor(message: string, options: DeployerErrorOptions = {}) {
    super(message, 'DEPLOYMENT_SUBMISSION_FAILED', options);
    this.name = 'DeploymentSubmissionError';
  }
}

export class InteractionSubmissionError extends DeployerError {
  constructor(message: string, options: DeployerErrorOptions = {}) {
    super(message, 'INTERACTION_SUBMISSION_FAILED', options);
    this.name = 'InteractionSubmissionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps a DeployerError as it is and wraps anything else with the given
 * factory, so workflow boundaries always report one of the named kinds.
 */
export function toDeployerError(error: unknown, wrap: (message: string, cause: unknown) => DeployerError): DeployerError {
  if (error instanceof DeployerError) {
    return error;
  }
  return wrap(errorMessage(error), error);
}
