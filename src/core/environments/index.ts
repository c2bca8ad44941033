/**
 * Environment operations.
 *
 * Everything the menu can do: blanket resets, adding an environment, and
 * listing with verification.
 */
export { createEnvContext } from './context.js';
export type { EnvContext } from './context.js';

export { resetSsh, resetGit } from './reset.js';
export type { ResetSshResult, ResetGitResult } from './reset.js';

export { addEnvironment } from './add.js';
export type {
    AddEnvironmentInput,
    AddEnvironmentHooks,
    AddEnvironmentResult,
    AddEnvironmentStatus,
    RegistrationPrompt,
} from './add.js';

export { RegistrationGate, isAffirmative } from './gate.js';
export type { GateState, RegistrationGateOptions } from './gate.js';

export { verifyGitIdentity } from './verify.js';
export type { GitVerification } from './verify.js';

export { listEnvironments } from './list.js';
export type { EnvironmentReport } from './list.js';
