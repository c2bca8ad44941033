/**
 * Runtime environment checks.
 *
 * The logger mirrors to stderr when nobody is watching the TUI; settings
 * pick the keychain default from the host OS.
 */

/** Set by the common CI providers */
const CI_MARKERS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'BUILDKITE',
    'JENKINS_URL',
];

/**
 * Headless: `GITENV_HEADLESS=true`, a CI marker, or stdout is not a TTY.
 */
export function isCi(env: NodeJS.ProcessEnv = process.env): boolean {

    if (env['GITENV_HEADLESS'] === 'true') return true;

    return CI_MARKERS.some((name) => !!env[name]) || !process.stdout.isTTY;

}

/** `GITENV_DEBUG` traces every observer event to stderr */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    return !!env['GITENV_DEBUG'];

}

/** OpenSSH's `UseKeychain` and `--apple-use-keychain` exist only on macOS */
export function isMac(): boolean {

    return process.platform === 'darwin';

}
