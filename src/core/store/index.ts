/**
 * Identity store module.
 *
 * IdentityStore owns every file write; the config-text helpers are the
 * pure transforms it applies.
 */
export { IdentityStore } from './store.js';

export type { RemoveResult, UpsertResult } from './store.js';

export {
    renderSshStanza,
    upsertSshStanza,
    removeSshStanza,
    listSshHosts,
    includeHeader,
    renderIncludeBlock,
    hasIncludeBlock,
    appendIncludeBlock,
    removeIncludeBlock,
    renderFragment,
    parseFragment,
    quoteGitValue,
} from './config-text.js';

export type { SshStanzaInput } from './config-text.js';
