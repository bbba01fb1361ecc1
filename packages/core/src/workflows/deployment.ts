import { pino } from 'pino';
import {
  ContractNameMismatchError,
  DeploymentSubmissionError,
  NoActiveAccountError,
  NoActiveNetworkError,
  TemplateNotFoundError,
  errorMessage,
  toDeployerError,
} from '../errors/index.js';
import { renderTemplate } from '../template/renderer.js';
import { validateContractName, validateTemplateName } from '../validators/index.js';
import { withProject, withTimeout } from '../utils/index.js';
import type { ActiveSession } from '../session/active-session.js';
import type {
  ChainToolkit,
  ContractStore,
  DeployReceipt,
  ProjectLoader,
  PublishRequest,
  TemplateStore,
} from '../ports.js';
import type {
  DeploymentResult,
  DeploymentSuccess,
  SourcePublication,
  TemplateParams,
} from '../types.js';

const logger = pino({ name: 'deployment-workflow', level: process.env.LOG_LEVEL || 'info' });

const DEFAULT_PUBLICATION_TIMEOUT_MS = 120_000;

export interface DeploymentWorkflowConfig {
  templates: TemplateStore;
  contracts: ContractStore;
  projects: ProjectLoader;
  toolkit: ChainToolkit;
  session: ActiveSession;
  /** Upper bound for sending the deployment and waiting for its receipt. */
  timeoutMs: number;
  /** Upper bound for source publication, which starts once the contract is on chain. */
  publicationTimeoutMs?: number;
  strictTemplates?: boolean;
}

export interface DeployCommand {
  templateName: string;
  contractName: string;
  params: TemplateParams;
  publishSource: boolean;
}

/**
 * Template → rendered source → compiled artifact → on-chain contract.
 *
 * The rendered source is written to the contract store before compilation
 * and stays there whatever happens next, so a failed deployment can be
 * inspected and retried.
 */
export class DeploymentWorkflow {
  constructor(private readonly config: DeploymentWorkflowConfig) {}

  async deploy(command: DeployCommand): Promise<DeploymentResult> {
    try {
      return await this.run(command);
    } catch (error) {
      const failure = toDeployerError(error, (message, cause) => new DeploymentSubmissionError(message, { cause }));
      logger.warn(
        { code: failure.code, template: command.templateName, contract: command.contractName },
        `Deployment failed: ${failure.message}`
      );
      return { status: 'error', error: failure };
    }
  }

  private async run(command: DeployCommand): Promise<DeploymentSuccess> {
    const { templates, contracts, projects, toolkit, session, timeoutMs } = this.config;
    const templateName = validateTemplateName(command.templateName);
    const contractName = validateContractName(command.contractName);

    if (!(await templates.exists(templateName))) {
      throw new TemplateNotFoundError(templateName);
    }
    const template = await templates.read(templateName);
    const source = renderTemplate(template, command.params, { strict: this.config.strictTemplates });

    await contracts.write(contractName, source);
    logger.debug({ template: templateName, contract: contractName }, 'Rendered contract source written');

    return withProject(projects, async (project): Promise<DeploymentSuccess> => {
      const declared = project.declaredIn(contractName);
      const artifact = declared.find((candidate) => candidate.name === contractName);
      if (!artifact) {
        throw new ContractNameMismatchError(
          contractName,
          declared.map((candidate) => candidate.name)
        );
      }

      const deployed = await session.runExclusive(async ({ identity, connection }) => {
        if (!identity) {
          throw new NoActiveAccountError();
        }
        if (!connection) {
          throw new NoActiveNetworkError();
        }
        if (command.publishSource) {
          toolkit.checkPublication(connection);
        }

        logger.info(
          { contract: contractName, network: connection.name, from: identity.address, publishSource: command.publishSource },
          'Submitting deployment'
        );

        let receipt: DeployReceipt;
        try {
          receipt = await withTimeout(
            toolkit.deploy({ artifact, identity, connection }),
            timeoutMs,
            `Deployment of ${contractName}`
          );
        } catch (error) {
          throw toDeployerError(
            error,
            (message, cause) => new DeploymentSubmissionError(`Deployment of "${contractName}" failed: ${message}`, { cause })
          );
        }

        logger.info(
          { contract: contractName, address: receipt.contractAddress, txHash: receipt.transactionHash },
          'Contract deployed'
        );
        return { receipt, identity, connection };
      });

      const { receipt, identity, connection } = deployed;
      const sourcePublication: SourcePublication = command.publishSource
        ? await this.publish({ artifact, address: receipt.contractAddress, connection })
        : { requested: false, published: false };

      return {
        status: 'success',
        contractName,
        abi: artifact.abi,
        bytecode: artifact.bytecode,
        deployedBytecode: receipt.deployedBytecode,
        contractAddress: receipt.contractAddress,
        deployerAddress: identity.address,
        network: connection.name,
        transactionHash: receipt.transactionHash,
        sourceCode: source,
        params: command.params,
        sourcePublication,
      };
    });
  }

  /** The contract is already on chain here, so no failure may turn into a deployment error. */
  private async publish(request: PublishRequest): Promise<SourcePublication> {
    const timeoutMs = this.config.publicationTimeoutMs ?? DEFAULT_PUBLICATION_TIMEOUT_MS;
    try {
      return await withTimeout(
        this.config.toolkit.publishSource(request),
        timeoutMs,
        `Source publication of ${request.artifact.name}`
      );
    } catch (error) {
      const message = errorMessage(error);
      logger.warn({ contract: request.artifact.name, address: request.address, error: message }, 'Source publication failed');
      return { requested: true, published: false, message };
    }
  }
}
