/**
 * Reset screens - blanket removal of everything gitenv wrote for SSH or Git.
 *
 * Confirm (danger, defaults to No) → run → list of removed files. With
 * `reset.confirm: false` the run starts as soon as the screen opens. Any key
 * on the result returns to the menu.
 */
import { useState, useCallback, useEffect } from 'react';
import type { ReactElement } from 'react';
import { Box, Text } from 'ink';
import { attempt } from '@logosdx/utils';

import type { ScreenProps } from '../../types.js';
import { useRouter } from '../../router.js';
import { useFocusScope } from '../../focus.js';
import { useFocusedInput } from '../../keyboard.js';
import { useAppContext } from '../../app-context.js';
import { Confirm, Panel, Spinner } from '../../components/index.js';
import { resetSsh, resetGit, toHomeRelative } from '../../../core/index.js';

type Scope = 'ssh' | 'git';

type Phase = 'confirm' | 'running' | 'done' | 'error';

interface ResetOutcome {
    removed: string[];

    /** Extra line under the file list */
    note?: string;
}

const COPY: Record<Scope, { title: string; message: string }> = {
    ssh: {
        title: 'Reset SSH',
        message: 'Delete every gitenv SSH key, the SSH client config, and all keys loaded in ssh-agent?',
    },
    git: {
        title: 'Reset Git',
        message: 'Delete the main Git config and every identity fragment?',
    },
};

/**
 * Result panel; claims focus so any key returns to the menu.
 */
function ResetResult({ title, outcome, homeDir }: {
    title: string;
    outcome: ResetOutcome;
    homeDir: string;
}): ReactElement {

    const { reset } = useRouter();
    const { isFocused } = useFocusScope('ResetResult');

    useFocusedInput(isFocused, () => reset());

    return (
        <Panel title={title} tone="success" footer="Press any key to return to the menu">
            {outcome.removed.length === 0
                ? <Text dimColor>Nothing to remove</Text>
                : (
                    <Box flexDirection="column">
                        <Text>Removed {outcome.removed.length} file(s):</Text>
                        {outcome.removed.map((path) => (
                            <Text key={path}>  {toHomeRelative(path, homeDir)}</Text>
                        ))}
                    </Box>
                )}
            {outcome.note && <Text dimColor>{outcome.note}</Text>}
        </Panel>
    );

}

function ResetError({ title, message }: { title: string; message: string }): ReactElement {

    const { reset } = useRouter();
    const { isFocused } = useFocusScope('ResetError');

    useFocusedInput(isFocused, () => reset());

    return (
        <Panel title={title} tone="danger" footer="Press any key to return to the menu">
            <Text color="red">{message}</Text>
        </Panel>
    );

}

export function ResetScreen({ scope }: { scope: Scope }): ReactElement {

    const { reset } = useRouter();
    const { ctx } = useAppContext();

    const [phase, setPhase] = useState<Phase>(ctx.settings.reset.confirm ? 'confirm' : 'running');
    const [outcome, setOutcome] = useState<ResetOutcome>({ removed: [] });
    const [error, setError] = useState<string | null>(null);

    const { title, message } = COPY[scope];

    const run = useCallback(async () => {

        setPhase('running');

        const [result, err] = await attempt(async (): Promise<ResetOutcome> => {

            if (scope === 'git') return resetGit(ctx);

            const ssh = await resetSsh(ctx);

            return {
                removed: ssh.removed,
                note: ssh.agentCleared ? 'ssh-agent cleared' : 'ssh-agent not cleared (no agent running?)',
            };

        });

        if (err) {

            setError(err.message);
            setPhase('error');

            return;

        }

        setOutcome(result);
        setPhase('done');

    }, [ctx, scope]);

    // Unconfirmed resets start once, on mount
    useEffect(() => {

        if (!ctx.settings.reset.confirm) void run();

    }, []);

    if (phase === 'confirm') {

        return (
            <Confirm
                title={title}
                message={message}
                variant="danger"
                focusLabel="ResetConfirm"
                onConfirm={() => void run()}
                onCancel={reset}
            />
        );

    }

    if (phase === 'running') {

        return <Spinner label={`${title}...`} />;

    }

    if (phase === 'error') {

        return <ResetError title={title} message={error ?? 'Reset failed'} />;

    }

    return <ResetResult title={title} outcome={outcome} homeDir={ctx.paths.homeDir} />;

}

export function ResetSshScreen({ params: _params }: ScreenProps): ReactElement {

    return <ResetScreen scope="ssh" />;

}

export function ResetGitScreen({ params: _params }: ScreenProps): ReactElement {

    return <ResetScreen scope="git" />;

}
