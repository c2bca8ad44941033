/**
 * Config text helpers.
 *
 * Pure string transforms over the three flat files gitenv edits: the SSH
 * client config, the main Git config and the per-identity Git fragment.
 * Nothing here touches the filesystem; the IdentityStore reads, calls these,
 * and writes back.
 *
 * Edits are line-based and leave unrelated content byte-for-byte intact,
 * apart from trailing whitespace at the end of the file.
 */
import type { GitUser } from '../identity/types.js';


// ─────────────────────────────────────────────────────────────
// Shared
// ─────────────────────────────────────────────────────────────

/**
 * Trim trailing whitespace and end non-empty text with one newline.
 */
function tidy(text: string): string {

    const trimmed = text.replace(/\s+$/, '');

    return trimmed ? `${trimmed}\n` : '';

}

/**
 * Append a block after existing content, separated by one blank line.
 */
function appendBlock(content: string, block: string): string {

    const existing = tidy(content);

    return existing ? `${existing}\n${tidy(block)}` : tidy(block);

}


// ─────────────────────────────────────────────────────────────
// SSH client config
// ─────────────────────────────────────────────────────────────

/**
 * Input for one SSH `Host` stanza.
 */
export interface SshStanzaInput {

    /** Host alias, e.g. `github.com-work` */
    alias: string;

    /** Real host name */
    hostname: string;

    /** Remote user */
    user: string;

    /** Private key, as it should appear in the file */
    identityFile: string;

    /** Emit `UseKeychain yes` (only understood by Apple's OpenSSH) */
    useKeychain: boolean;

}

interface SshBlock {

    /** Host patterns of a `Host` line; null for the preamble or a `Match` block */
    hosts: string[] | null;
    lines: string[];

}

const SSH_BLOCK_START = /^\s*(host|match)\s+(.*)$/i;

/**
 * Split an SSH config into blocks. Joining every block's lines with `\n`
 * reproduces the input exactly.
 */
function splitSshBlocks(content: string): SshBlock[] {

    const blocks: SshBlock[] = [{ hosts: null, lines: [] }];

    for (const line of content.split('\n')) {

        const match = SSH_BLOCK_START.exec(line);

        if (match) {

            const keyword = (match[1] ?? '').toLowerCase();
            const rest = (match[2] ?? '').trim();

            blocks.push({
                hosts: keyword === 'host' ? rest.split(/\s+/).filter(Boolean) : null,
                lines: [line],
            });

            continue;

        }

        const current = blocks[blocks.length - 1];

        if (current) current.lines.push(line);

    }

    return blocks;

}

function joinBlocks(blocks: SshBlock[]): string {

    return blocks
        .filter((block) => block.lines.length > 0)
        .map((block) => block.lines.join('\n'))
        .join('\n');

}

function isAliasBlock(block: SshBlock, alias: string): boolean {

    return block.hosts !== null && block.hosts.length === 1 && block.hosts[0] === alias;

}

/**
 * Render a `Host` stanza.
 *
 * @example
 * ```typescript
 * renderSshStanza({
 *     alias: 'github.com-work',
 *     hostname: 'github.com',
 *     user: 'git',
 *     identityFile: '~/.ssh/id_ed25519_work',
 *     useKeychain: false,
 * })
 * // Host github.com-work
 * //   HostName github.com
 * //   User git
 * //   IdentityFile ~/.ssh/id_ed25519_work
 * //   AddKeysToAgent yes
 * //   IdentitiesOnly yes
 * ```
 */
export function renderSshStanza(input: SshStanzaInput): string {

    const lines = [
        `Host ${input.alias}`,
        `  HostName ${input.hostname}`,
        `  User ${input.user}`,
        `  IdentityFile ${input.identityFile}`,
        '  AddKeysToAgent yes',
    ];

    if (input.useKeychain) lines.push('  UseKeychain yes');

    lines.push('  IdentitiesOnly yes');

    return lines.join('\n') + '\n';

}

/**
 * Replace the stanza for `alias` in place, or append it when absent.
 *
 * A config holding several stanzas for the same alias keeps only the first
 * position, with the new content.
 */
export function upsertSshStanza(
    content: string,
    alias: string,
    stanza: string,
): { content: string; replaced: boolean } {

    const blocks = splitSshBlocks(content);

    if (!blocks.some((block) => isAliasBlock(block, alias))) {

        return { content: appendBlock(content, stanza), replaced: false };

    }

    const stanzaLines = tidy(stanza).split('\n').slice(0, -1);
    const result: SshBlock[] = [];
    let placed = false;

    for (const block of blocks) {

        if (!isAliasBlock(block, alias)) {

            result.push(block);
            continue;

        }

        if (placed) continue;

        // Keep the blank lines that separated the old stanza from the next one
        let lastContent = block.lines.length - 1;

        while (lastContent > 0 && !(block.lines[lastContent] ?? '').trim()) lastContent--;

        result.push({
            hosts: [alias],
            lines: [...stanzaLines, ...block.lines.slice(lastContent + 1)],
        });

        placed = true;

    }

    return { content: tidy(joinBlocks(result)), replaced: true };

}

/**
 * Remove every stanza whose only host pattern is `alias`.
 */
export function removeSshStanza(content: string, alias: string): { content: string; removed: boolean } {

    const blocks = splitSshBlocks(content);
    const kept = blocks.filter((block) => !isAliasBlock(block, alias));

    if (kept.length === blocks.length) {

        return { content, removed: false };

    }

    return { content: tidy(joinBlocks(kept)), removed: true };

}

/**
 * Host patterns of every `Host` line, in file order.
 */
export function listSshHosts(content: string): string[] {

    return splitSshBlocks(content).flatMap((block) => block.hosts ?? []);

}


// ─────────────────────────────────────────────────────────────
// Main Git config
// ─────────────────────────────────────────────────────────────

const SECTION_START = /^\s*\[/;

/**
 * Header line of an identity's conditional include.
 *
 * The trailing slash makes Git match every repository below the directory.
 */
export function includeHeader(directory: string): string {

    const dir = directory.endsWith('/') ? directory : `${directory}/`;

    return `[includeIf "gitdir:${dir}"]`;

}

/**
 * Render a conditional include block.
 *
 * @example
 * ```typescript
 * renderIncludeBlock('~/code/work', '~/.gitconfig-work')
 * // [includeIf "gitdir:~/code/work/"]
 * // 	path = ~/.gitconfig-work
 * ```
 */
export function renderIncludeBlock(directory: string, fragmentPath: string): string {

    return `${includeHeader(directory)}\n\tpath = ${fragmentPath}\n`;

}

/**
 * Whether a line equal to `header` (ignoring surrounding whitespace) exists.
 */
export function hasIncludeBlock(content: string, header: string): boolean {

    return content.split('\n').some((line) => line.trim() === header);

}

/**
 * Append an include block unless its header line is already present.
 */
export function appendIncludeBlock(content: string, block: string): { content: string; added: boolean } {

    const header = block.split('\n')[0] ?? '';

    if (hasIncludeBlock(content, header)) {

        return { content, added: false };

    }

    return { content: appendBlock(content, block), added: true };

}

/**
 * Remove every section whose header line equals `header`, together with its
 * body up to the next section.
 */
export function removeIncludeBlock(content: string, header: string): { content: string; removed: boolean } {

    const kept: string[] = [];
    let skipping = false;
    let removed = false;

    for (const line of content.split('\n')) {

        if (SECTION_START.test(line)) {

            skipping = line.trim() === header;
            removed = removed || skipping;

        }

        if (!skipping) kept.push(line);

    }

    return removed
        ? { content: tidy(kept.join('\n')), removed }
        : { content, removed };

}


// ─────────────────────────────────────────────────────────────
// Git fragment
// ─────────────────────────────────────────────────────────────

/**
 * Quote a Git config value when Git would otherwise misread it.
 *
 * Backslashes and double quotes are always escaped. Values with leading or
 * trailing whitespace, or a comment character, are wrapped in quotes.
 *
 * @example
 * ```typescript
 * quoteGitValue('Jane Doe')     // 'Jane Doe'
 * quoteGitValue('Team #1')      // '"Team #1"'
 * quoteGitValue('say "hi"')     // 'say \\"hi\\"'
 * ```
 */
export function quoteGitValue(value: string): string {

    const escaped = value
        .replace(/\\/g, '\\\\')
        .replace(/"/g, '\\"')
        .replace(/\n/g, '\\n')
        .replace(/\t/g, '\\t');

    const needsQuotes = /^\s|\s$|[#;]/.test(value);

    return needsQuotes ? `"${escaped}"` : escaped;

}

/**
 * Render a per-identity fragment holding the `[user]` section.
 */
export function renderFragment(user: GitUser): string {

    return [
        '[user]',
        `\tname = ${quoteGitValue(user.name)}`,
        `\temail = ${quoteGitValue(user.email)}`,
        '',
    ].join('\n');

}


const FRAGMENT_KEY = /^\s*(name|email)\s*=\s*(.*?)\s*$/i;

/**
 * Reverse of quoteGitValue for the values renderFragment writes.
 */
function unquoteGitValue(raw: string): string {

    const inner = raw.length >= 2 && raw.startsWith('"') && raw.endsWith('"')
        ? raw.slice(1, -1)
        : raw;

    return inner.replace(/\\([\\"nt])/g, (_, ch: string) => {

        if (ch === 'n') return '\n';
        if (ch === 't') return '\t';

        return ch;

    });

}

/**
 * Read `name` and `email` back out of a fragment's `[user]` section.
 *
 * @returns null when either key is missing
 */
export function parseFragment(content: string): GitUser | null {

    const found: Partial<GitUser> = {};
    let inUser = false;

    for (const line of content.split('\n')) {

        if (SECTION_START.test(line)) {

            inUser = line.trim().toLowerCase() === '[user]';
            continue;

        }

        const match = inUser ? FRAGMENT_KEY.exec(line) : null;

        if (!match) continue;

        const key = (match[1] ?? '').toLowerCase();
        const value = unquoteGitValue(match[2] ?? '');

        if (key === 'name') found.name = value;
        else found.email = value;

    }

    return found.name !== undefined && found.email !== undefined
        ? { name: found.name, email: found.email }
        : null;

}
