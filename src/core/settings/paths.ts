/**
 * Path resolution.
 *
 * Turns the `~`-relative paths of settings into the absolute
 * WorkspacePaths struct that the store and the adapters consume.
 */
import { isAbsolute, join, resolve, sep } from 'node:path';

import type { Settings, WorkspacePaths } from './types.js';


/**
 * Expand a leading `~` against the given home directory.
 *
 * Relative paths without `~` resolve against the current directory.
 *
 * @example
 * ```typescript
 * expandHome('~/.ssh', '/home/jane')   // '/home/jane/.ssh'
 * expandHome('~', '/home/jane')        // '/home/jane'
 * expandHome('/etc/ssh', '/home/jane') // '/etc/ssh'
 * ```
 */
export function expandHome(path: string, homeDir: string): string {

    if (path === '~') return homeDir;
    if (path.startsWith('~/')) return join(homeDir, path.slice(2));
    if (isAbsolute(path)) return path;

    return resolve(path);

}


/**
 * Render an absolute path in `~/` form when it lives under the home
 * directory. Config files written this way stay valid if the home directory
 * moves, and both OpenSSH and Git expand `~/` themselves.
 *
 * @example
 * ```typescript
 * toHomeRelative('/home/jane/.ssh/id_ed25519_work', '/home/jane') // '~/.ssh/id_ed25519_work'
 * toHomeRelative('/srv/keys/id', '/home/jane')                    // '/srv/keys/id'
 * ```
 */
export function toHomeRelative(path: string, homeDir: string): string {

    if (path === homeDir) return '~';

    const prefix = homeDir.endsWith(sep) ? homeDir : homeDir + sep;

    if (path.startsWith(prefix)) {

        return '~/' + path.slice(prefix.length).split(sep).join('/');

    }

    return path;

}


/**
 * Resolve every configured location to an absolute path.
 */
export function resolvePaths(settings: Settings, homeDir: string): WorkspacePaths {

    const sshDir = expandHome(settings.paths.sshDir, homeDir);

    return {
        homeDir,
        sshDir,
        sshConfig: settings.paths.sshConfig
            ? expandHome(settings.paths.sshConfig, homeDir)
            : join(sshDir, 'config'),
        gitConfig: expandHome(settings.paths.gitConfig, homeDir),
        fragmentDir: expandHome(settings.paths.fragmentDir, homeDir),
        codeDir: expandHome(settings.paths.codeDir, homeDir),
        logFile: expandHome(settings.logging.file, homeDir),
    };

}
