export * from './errors/index.js';
export * from './types.js';
export * from './ports.js';
export * from './validators/index.js';
export * from './utils/index.js';
export { renderTemplate, findPlaceholders, type RenderOptions } from './template/renderer.js';
export { ActiveSession, type SessionSnapshot } from './session/active-session.js';
export { functionSignature, listFunctions, resolveMethod } from './contracts/methods.js';
export { encodeArguments, MethodArgumentSchema, MethodArgumentsSchema } from './contracts/arguments.js';
export { DeploymentWorkflow, type DeploymentWorkflowConfig, type DeployCommand } from './workflows/deployment.js';
export { InteractionWorkflow, type InteractionWorkflowConfig, type InteractCommand } from './workflows/interaction.js';
