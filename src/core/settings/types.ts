/**
 * Settings Types
 *
 * Settings live in ~/.gitenv/settings.yml. Every field is optional in the
 * file; the parsed shape below always has defaults filled in.
 */
import type { SettingsSchemaType } from './schema.js';

/**
 * Fully parsed settings.
 *
 * @example
 * ```yaml
 * paths:
 *     codeDir: ~/src
 * host:
 *     hostname: github.com
 * logging:
 *     level: verbose
 * ```
 */
export type Settings = SettingsSchemaType;

export type PathSettings = Settings['paths'];
export type NamingSettings = Settings['naming'];
export type HostSettings = Settings['host'];
export type SshSettings = Settings['ssh'];
export type LoggingSettings = Settings['logging'];

/**
 * Absolute filesystem locations resolved from settings.
 *
 * This is the only way core code learns where things live, so tests point
 * it at a temp directory instead of the real home directory.
 */
export interface WorkspacePaths {
    /** Home directory used to expand `~` and to write `~/` forms into config files */
    homeDir: string;

    /** Directory holding per-identity keys (mode 700) */
    sshDir: string;

    /** Shared SSH client config */
    sshConfig: string;

    /** Shared main Git config carrying the includeIf blocks */
    gitConfig: string;

    /** Directory holding per-identity Git fragments */
    fragmentDir: string;

    /** Root of the per-identity working directories */
    codeDir: string;

    /** Log file */
    logFile: string;
}
