/**
 * Command runner.
 *
 * Every external program gitenv drives (ssh-keygen, ssh-add, ssh, git, the
 * clipboard and browser helpers) is launched through a CommandRunner, so
 * tests swap in a scripted fake instead of spawning processes.
 */
import { execFile } from 'node:child_process'

import { observer } from '../observer.js'


/**
 * Options for a single command.
 */
export interface RunOptions {

    /** Working directory */
    cwd?: string

    /** Variables merged over the current environment */
    env?: Record<string, string>

    /** Written to stdin, which is then closed */
    input?: string

    /** Kill the process after this many milliseconds */
    timeoutMs?: number
}


/**
 * Captured result of a finished command.
 */
export interface RunResult {

    /** Exit code; 1 when the process was killed by a signal or timeout */
    code: number

    stdout: string
    stderr: string
}


/**
 * Launches external programs.
 *
 * Implementations resolve for every exit code and reject only when the
 * program cannot be started at all.
 */
export interface CommandRunner {

    run(command: string, args: string[], options?: RunOptions): Promise<RunResult>
}


/**
 * Raised when a program cannot be started (not installed, not executable).
 */
export class CommandSpawnError extends Error {

    override readonly name = 'CommandSpawnError' as const

    constructor(
        public readonly command: string,
        public readonly reason: string,
    ) {

        super(`Could not run ${command}: ${reason}`)
    }
}


/** Output cap per stream */
const MAX_BUFFER = 4 * 1024 * 1024


/**
 * CommandRunner backed by `child_process.execFile`.
 *
 * No shell is involved, so arguments are passed through verbatim.
 */
export class ExecFileRunner implements CommandRunner {

    run(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {

        return new Promise((resolve, reject) => {

            const child = execFile(
                command,
                args,
                {
                    cwd: options.cwd,
                    env: options.env ? { ...process.env, ...options.env } : process.env,
                    timeout: options.timeoutMs,
                    maxBuffer: MAX_BUFFER,
                    encoding: 'utf8',
                },
                (error, stdout, stderr) => {

                    if (!error) {

                        resolve({ code: 0, stdout, stderr })
                        return
                    }

                    const code: unknown = error.code

                    // String codes are errno names from a failed spawn (ENOENT, EACCES)
                    if (typeof code === 'string') {

                        reject(new CommandSpawnError(command, error.message))
                        return
                    }

                    const timedOut = !!error.killed && options.timeoutMs !== undefined

                    resolve({
                        code: typeof code === 'number' ? code : 1,
                        stdout,
                        stderr: timedOut
                            ? `${stderr}${stderr ? '\n' : ''}Timed out after ${options.timeoutMs}ms`
                            : stderr,
                    })
                },
            )

            if (options.input !== undefined && child.stdin) {

                // EPIPE when the program exits before reading its input
                child.stdin.on('error', (err) => {

                    observer.emit('error', { source: 'runner', error: err, context: { command } })
                })

                child.stdin.end(options.input)
            }
        })
    }
}

