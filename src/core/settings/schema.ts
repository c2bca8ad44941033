/**
 * Settings Zod schemas and validation.
 *
 * Settings describe where gitenv keeps its files and how it talks to the
 * Git host. Validated on load so an invalid file never reaches the store.
 */
import { z } from 'zod';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

/**
 * Log level.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * Key algorithms handed to ssh-keygen.
 */
const KeyTypeSchema = z.enum(['ed25519', 'rsa', 'ecdsa']);

/**
 * File size pattern (e.g., '10mb', '100kb').
 */
const FileSizeSchema = z
    .string()
    .regex(/^\d+\s*(b|kb|mb|gb)$/i, 'Invalid file size format (e.g., "10mb")');

/**
 * A filesystem path. `~` and `~/` are expanded against the home directory.
 */
const PathSchema = z.string().min(1, 'Path must not be empty');

/**
 * Filename prefixes end up in glob-like scans, so no separators allowed.
 */
const PrefixSchema = z
    .string()
    .min(1, 'Prefix must not be empty')
    .regex(/^[^/\\]+$/, 'Prefix must not contain path separators');

// ─────────────────────────────────────────────────────────────
// Section Schemas
// ─────────────────────────────────────────────────────────────

const PathsSchema = z.object({
    sshDir: PathSchema.default('~/.ssh'),
    sshConfig: PathSchema.optional(),
    gitConfig: PathSchema.default('~/.gitconfig'),
    fragmentDir: PathSchema.default('~'),
    codeDir: PathSchema.default('~/code'),
});

const NamingSchema = z.object({
    keyPrefix: PrefixSchema.default('id_ed25519_'),
    fragmentPrefix: PrefixSchema.default('.gitconfig-'),
});

const HostSchema = z.object({
    hostname: z.string().min(1).default('github.com'),
    user: z.string().min(1).default('git'),
    keysUrl: z.string().url().default('https://github.com/settings/keys'),
    successPhrase: z.string().min(1).default('successfully authenticated'),
});

const SshSchema = z.object({
    keyType: KeyTypeSchema.default('ed25519'),
    useKeychain: z.boolean().optional(),
    probeTimeoutMs: z.number().int().positive().default(15_000),
});

const RegistrationSchema = z.object({
    timeoutMs: z.number().int().positive().optional(),
});

const ResetSchema = z.object({
    /** Ask before a blanket reset; off runs it straight from the menu */
    confirm: z.boolean().default(true),
});

const LoggingSchema = z.object({
    enabled: z.boolean().default(true),
    level: LogLevelSchema.default('info'),
    file: PathSchema.default('~/.gitenv/gitenv.log'),
    maxSize: FileSizeSchema.default('5mb'),
    maxFiles: z.number().int().min(1).default(3),
});

// ─────────────────────────────────────────────────────────────
// Main Settings Schema
// ─────────────────────────────────────────────────────────────

/**
 * Complete settings schema. Every section is optional in the file and
 * filled with defaults on parse.
 */
export const SettingsSchema = z.object({
    paths: PathsSchema.default({}),
    naming: NamingSchema.default({}),
    host: HostSchema.default({}),
    ssh: SshSchema.default({}),
    registration: RegistrationSchema.default({}),
    reset: ResetSchema.default({}),
    logging: LoggingSchema.default({}),
});

export type SettingsSchemaType = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Error
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when settings validation fails.
 */
export class SettingsValidationError extends Error {

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);
        this.name = 'SettingsValidationError';

    }

}

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Parse and validate settings, returning defaults for missing fields.
 *
 * @throws SettingsValidationError if validation fails
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ paths: { codeDir: '~/src' } })
 * // settings.host.hostname === 'github.com' (default)
 * ```
 */
export function parseSettings(settings: unknown): SettingsSchemaType {

    const result = SettingsSchema.safeParse(settings ?? {});

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const field = firstIssue?.path.join('.') || 'unknown';

        throw new SettingsValidationError(
            `${field}: ${firstIssue?.message ?? 'Settings validation failed'}`,
            field,
            result.error.issues,
        );

    }

    return result.data;

}
