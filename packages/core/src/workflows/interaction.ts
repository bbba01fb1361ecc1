import { pino } from 'pino';
import {
  ContractNotFoundError,
  InteractionSubmissionError,
  NoActiveAccountError,
  NoActiveNetworkError,
  toDeployerError,
} from '../errors/index.js';
import { encodeArguments } from '../contracts/arguments.js';
import { functionSignature, resolveMethod } from '../contracts/methods.js';
import { validateAddress, validateContractName } from '../validators/index.js';
import { withProject, withTimeout } from '../utils/index.js';
import type { ActiveSession } from '../session/active-session.js';
import type { ChainToolkit, ProjectLoader, TransactReceipt } from '../ports.js';
import type { InteractionResult, InteractionSuccess, MethodArgument } from '../types.js';

const logger = pino({ name: 'interaction-workflow', level: process.env.LOG_LEVEL || 'info' });

export interface InteractionWorkflowConfig {
  projects: ProjectLoader;
  toolkit: ChainToolkit;
  session: ActiveSession;
  timeoutMs: number;
}

export interface InteractCommand {
  contractName: string;
  contractAddress: string;
  /** Bare method name or full signature, e.g. `set(uint256)`. */
  method: string;
  args: readonly MethodArgument[];
}

export class InteractionWorkflow {
  constructor(private readonly config: InteractionWorkflowConfig) {}

  async interact(command: InteractCommand): Promise<InteractionResult> {
    try {
      return await this.run(command);
    } catch (error) {
      const failure = toDeployerError(error, (message, cause) => new InteractionSubmissionError(message, { cause }));
      logger.warn(
        { code: failure.code, contract: command.contractName, method: command.method },
        `Interaction failed: ${failure.message}`
      );
      return { status: 'error', error: failure };
    }
  }

  private async run(command: InteractCommand): Promise<InteractionSuccess> {
    const { projects, toolkit, session, timeoutMs } = this.config;
    const contractName = validateContractName(command.contractName);
    const address = validateAddress(command.contractAddress);

    return withProject(projects, async (project): Promise<InteractionSuccess> => {
      const artifact = project.get(contractName);
      if (!artifact) {
        throw new ContractNotFoundError(contractName);
      }

      const method = resolveMethod(contractName, artifact.abi, command.method);
      const signature = functionSignature(method);
      const args = encodeArguments(method, command.args);

      return session.runExclusive(async ({ identity, connection }): Promise<InteractionSuccess> => {
        if (!identity) {
          throw new NoActiveAccountError();
        }
        if (!connection) {
          throw new NoActiveNetworkError();
        }

        logger.info({ contract: contractName, address, method: signature, from: identity.address }, 'Submitting transaction');

        let receipt: TransactReceipt;
        try {
          receipt = await withTimeout(
            toolkit.transact({ address, method, args, identity, connection }),
            timeoutMs,
            `${contractName}.${signature}`
          );
        } catch (error) {
          throw toDeployerError(
            error,
            (message, cause) => new InteractionSubmissionError(`${contractName}.${signature} failed: ${message}`, { cause })
          );
        }

        return {
          status: 'success',
          transactionHash: receipt.transactionHash,
          transactionStatus: receipt.status,
          blockNumber: receipt.blockNumber.toString(),
          contractName,
          contractAddress: address,
          method: signature,
          from: identity.address,
        };
      });
    });
  }
}
