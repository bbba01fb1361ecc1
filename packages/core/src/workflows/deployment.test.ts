import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { DeploymentWorkflow, type DeployCommand } from './deployment.js';
import { ActiveSession } from '../session/active-session.js';
import {
  FakeChainToolkit,
  FakeNetworkConnector,
  FakeProjectLoader,
  InMemoryContractStore,
  InMemoryTemplateStore,
  TEST_CONTRACT_ADDRESS,
  TEST_IDENTITY,
  TEST_TX_HASH,
} from '../testing/index.js';
import type { DeploymentResult, DeploymentSuccess, WorkflowFailure } from '../types.js';

const TEMPLATE = 'contract <NAME> { uint x = <VAL>; }';

function expectSuccess(result: DeploymentResult): DeploymentSuccess {
  if (result.status !== 'success') {
    throw new Error(`expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result;
}

function expectFailure(result: DeploymentResult): WorkflowFailure {
  if (result.status !== 'error') {
    throw new Error(`expected failure, deployed ${result.contractName}`);
  }
  return result;
}

describe('DeploymentWorkflow', () => {
  let templates: InMemoryTemplateStore;
  let contracts: InMemoryContractStore;
  let projects: FakeProjectLoader;
  let toolkit: FakeChainToolkit;
  let session: ActiveSession;
  let workflow: DeploymentWorkflow;

  const command = (overrides: Partial<DeployCommand> = {}): DeployCommand => ({
    templateName: 'Simple',
    contractName: 'Foo',
    params: { NAME: 'Foo', VAL: '5' },
    publishSource: false,
    ...overrides,
  });

  beforeEach(async () => {
    templates = new InMemoryTemplateStore({ Simple: TEMPLATE });
    contracts = new InMemoryContractStore();
    projects = new FakeProjectLoader(contracts);
    toolkit = new FakeChainToolkit();
    session = new ActiveSession(new FakeNetworkConnector());
    workflow = new DeploymentWorkflow({ templates, contracts, projects, toolkit, session, timeoutMs: 1000 });

    await session.setIdentity(TEST_IDENTITY);
    await session.setConnection('development');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should render, compile and deploy with the active identity', async () => {
    const result = expectSuccess(await workflow.deploy(command()));

    expect(result).toMatchObject({
      status: 'success',
      contractName: 'Foo',
      contractAddress: TEST_CONTRACT_ADDRESS,
      deployerAddress: TEST_IDENTITY.address,
      transactionHash: TEST_TX_HASH,
      network: 'development',
      sourceCode: 'contract Foo { uint x = 5; }',
      params: { NAME: 'Foo', VAL: '5' },
      bytecode: '0x6080',
      deployedBytecode: '0x6080',
    });
    expect(toolkit.deployments).toHaveLength(1);
    expect(toolkit.deployments[0].identity).toBe(TEST_IDENTITY);
    expect(toolkit.deployments[0].artifact.name).toBe('Foo');
    expect(contracts.sources.get('Foo')).toBe('contract Foo { uint x = 5; }');
  });

  it('should publish the source of the deployed contract when asked', async () => {
    const result = expectSuccess(await workflow.deploy(command({ publishSource: true })));

    expect(result.sourcePublication).toEqual({ requested: true, published: true });
    expect(toolkit.publications).toHaveLength(1);
    expect(toolkit.publications[0].address).toBe(TEST_CONTRACT_ADDRESS);
    expect(toolkit.publications[0].artifact.name).toBe('Foo');
    expect(toolkit.publications[0].connection.name).toBe('development');
  });

  it('should not publish unless asked', async () => {
    const result = expectSuccess(await workflow.deploy(command()));

    expect(result.sourcePublication).toEqual({ requested: false, published: false });
    expect(toolkit.publications).toHaveLength(0);
  });

  it('should refuse publication on an unsuitable network before deploying', async () => {
    toolkit.behaviour = { publicationUnavailable: 'Source publication requested but EXPLORER_API_KEY is not set' };

    const failure = expectFailure(await workflow.deploy(command({ publishSource: true })));

    expect(failure.error.code).toBe('DEPLOYMENT_SUBMISSION_FAILED');
    expect(failure.error.message).toBe('Source publication requested but EXPLORER_API_KEY is not set');
    expect(toolkit.deployments).toHaveLength(0);
  });

  it('should keep a deployment successful when publication outlasts the deploy timeout', async () => {
    vi.useFakeTimers();
    toolkit.behaviour = { publishHang: true };
    const slowExplorer = new DeploymentWorkflow({
      templates,
      contracts,
      projects,
      toolkit,
      session,
      timeoutMs: 1000,
      publicationTimeoutMs: 5000,
    });

    const pending = slowExplorer.deploy(command({ publishSource: true }));
    await vi.advanceTimersByTimeAsync(5000);
    const result = expectSuccess(await pending);

    expect(result.contractAddress).toBe(TEST_CONTRACT_ADDRESS);
    expect(result.sourcePublication).toEqual({
      requested: true,
      published: false,
      message: 'Source publication of Foo timed out after 5000ms',
    });
  });

  it('should accept a template name with the source extension', async () => {
    expectSuccess(await workflow.deploy(command({ templateName: 'Simple.sol' })));
  });

  it('should report a name mismatch without submitting anything', async () => {
    const failure = expectFailure(await workflow.deploy(command({ contractName: 'Bar' })));

    expect(failure.error.code).toBe('CONTRACT_NAME_MISMATCH');
    expect(failure.error.message).toBe(
      'Contract "Bar" was not found in the rendered source (declared: Foo). ' +
        'Please make sure that the contract name declared in the template is the same as contract_name.'
    );
    expect(toolkit.deployments).toHaveLength(0);
  });

  it('should not pick up a same-named contract from another source file', async () => {
    await contracts.write('Legacy', 'contract Bar { }');

    const failure = expectFailure(await workflow.deploy(command({ contractName: 'Bar' })));

    expect(failure.error.code).toBe('CONTRACT_NAME_MISMATCH');
    expect(toolkit.deployments).toHaveLength(0);
  });

  it('should refuse to deploy without an active account', async () => {
    await session.clearIdentity();

    const failure = expectFailure(await workflow.deploy(command()));

    expect(failure.error.code).toBe('NO_ACTIVE_ACCOUNT');
    expect(toolkit.deployments).toHaveLength(0);
  });

  it('should refuse to deploy without an active network', async () => {
    await session.disconnect();

    const failure = expectFailure(await workflow.deploy(command()));

    expect(failure.error.code).toBe('NO_ACTIVE_NETWORK');
    expect(toolkit.deployments).toHaveLength(0);
  });

  it('should validate names before any I/O', async () => {
    const badTemplate = expectFailure(await workflow.deploy(command({ templateName: '../etc/passwd' })));
    const badContract = expectFailure(await workflow.deploy(command({ contractName: 'Foo/../../x' })));

    expect(badTemplate.error.code).toBe('INVALID_NAME');
    expect(badContract.error.code).toBe('INVALID_NAME');
    expect(contracts.writes).toBe(0);
    expect(projects.loads).toBe(0);
  });

  it('should report a missing template', async () => {
    const failure = expectFailure(await workflow.deploy(command({ templateName: 'Missing' })));

    expect(failure.error.code).toBe('TEMPLATE_NOT_FOUND');
    expect(failure.error.message).toBe('Template "Missing" is not available');
    expect(contracts.writes).toBe(0);
  });

  it('should keep the written source when the chain rejects the deployment', async () => {
    toolkit.behaviour = { deployError: 'insufficient funds for gas' };

    const failure = expectFailure(await workflow.deploy(command()));

    expect(failure.error.code).toBe('DEPLOYMENT_SUBMISSION_FAILED');
    expect(failure.error.message).toBe('Deployment of "Foo" failed: insufficient funds for gas');
    expect(contracts.sources.get('Foo')).toBe('contract Foo { uint x = 5; }');
  });

  it('should release the project on success and on failure', async () => {
    await workflow.deploy(command());
    expect(projects.closes).toBe(1);

    await workflow.deploy(command({ contractName: 'Bar' }));
    expect(projects.closes).toBe(2);

    toolkit.behaviour = { deployError: 'nonce too low' };
    await workflow.deploy(command());
    expect(projects.loads).toBe(3);
    expect(projects.closes).toBe(3);
  });

  it('should report compilation failures of the rendered source', async () => {
    const failure = expectFailure(await workflow.deploy(command({ params: { NAME: 'Foo' } })));

    expect(failure.error.code).toBe('COMPILATION_FAILED');
    expect(contracts.sources.get('Foo')).toBe('contract Foo { uint x = <VAL>; }');
    expect(toolkit.deployments).toHaveLength(0);
  });

  it('should deploy while another source in the project fails to compile', async () => {
    await contracts.write('Draft', 'contract Draft { uint x = <VAL>; }');

    const result = expectSuccess(await workflow.deploy(command()));

    expect(result.contractName).toBe('Foo');
    expect(toolkit.deployments).toHaveLength(1);
  });

  it('should fail strict rendering when parameters are missing', async () => {
    const strict = new DeploymentWorkflow({
      templates,
      contracts,
      projects,
      toolkit,
      session,
      timeoutMs: 1000,
      strictTemplates: true,
    });

    const failure = expectFailure(await strict.deploy(command({ params: { NAME: 'Foo' } })));

    expect(failure.error.code).toBe('INCOMPLETE_TEMPLATE');
    expect(failure.error.message).toBe('Template parameters missing for placeholders: VAL');
    expect(toolkit.deployments).toHaveLength(0);
  });

  it('should turn a hung submission into a submission error', async () => {
    vi.useFakeTimers();
    toolkit.behaviour = { hang: true };

    const pending = workflow.deploy(command());
    await vi.advanceTimersByTimeAsync(1000);
    const failure = expectFailure(await pending);

    expect(failure.error.code).toBe('DEPLOYMENT_SUBMISSION_FAILED');
    expect(failure.error.message).toBe('Deployment of "Foo" failed: Deployment of Foo timed out after 1000ms');
    expect(projects.closes).toBe(1);
  });
});
