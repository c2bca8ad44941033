/**
 * EnvAddScreen - create (or re-create) one identity environment.
 *
 * Form → overwrite confirmation when the identity exists → step progress
 * → public key and registration prompt → verification results.
 *
 * addEnvironment drives the flow; its hooks are bridged to screen phases.
 * `confirmOverwrite` parks a resolver until the dialog answers, and
 * `awaitRegistration` hands over the gate the prompt feeds.
 */
import { useState, useEffect, useRef } from 'react';
import { Box, Text } from 'ink';
import { TextInput } from '@inkjs/ui';
import { attempt } from '@logosdx/utils';

import type { ReactElement } from 'react';
import type { ScreenProps } from '../../types.js';
import type {
    AddEnvironmentHooks,
    AddEnvironmentInput,
    AddEnvironmentResult,
    Identity,
    RegistrationGate,
    RegistrationPrompt,
} from '../../../core/index.js';
import type { StatusListItem } from '../../components/index.js';

import { useRouter } from '../../router.js';
import { useFocusScope } from '../../focus.js';
import { useFocusedInput } from '../../keyboard.js';
import { useAppContext } from '../../app-context.js';
import { useOnEvent } from '../../hooks/index.js';
import { Confirm, Form, Panel, StatusList } from '../../components/index.js';
import { addEnvironment, sanitizeIdentityId, toHomeRelative } from '../../../core/index.js';
import { applyStepEvent, applyWarningEvent, initialSteps } from './steps.js';

type Phase = 'form' | 'running' | 'overwrite' | 'registration' | 'done' | 'error';

interface OpenGate {
    gate: RegistrationGate;
    prompt: RegistrationPrompt;
}

export function validateIdentityId(value: string): string | undefined {

    return sanitizeIdentityId(value) ? undefined : 'Use letters, digits, "-" or "_"';

}

/**
 * Shows the public key and waits for the user to confirm registration.
 */
function RegistrationStep({ gate, prompt, homeDir }: OpenGate & { homeDir: string }): ReactElement {

    const { isFocused } = useFocusScope('Registration');
    const [prompts, setPrompts] = useState(gate.prompts);

    useFocusedInput(isFocused, (_input, key) => {

        if (key.escape) gate.cancel();

    });

    return (
        <Panel title="Register your public key" tone="warning" footer="[Esc] skip verification">
            <Box flexDirection="column" gap={1}>
                <Text>
                    {prompt.copied ? 'Copied to the clipboard: ' : 'Public key: '}
                    <Text dimColor>{toHomeRelative(prompt.identity.pubKeyPath, homeDir)}</Text>
                </Text>
                <Text color="green">{prompt.publicKey ?? '(public key could not be read)'}</Text>
                <Text>
                    Add it at <Text color="cyan">{prompt.keysUrl}</Text>
                    {prompt.browserOpened ? ' (opened in your browser)' : ''}
                </Text>
                {prompts > 0 && (
                    <Text color="yellow">Not confirmed yet. Type yes once the key is registered.</Text>
                )}
                <Box gap={1}>
                    <Text>Registered? (yes)</Text>
                    <TextInput
                        key={prompts}
                        isDisabled={!isFocused}
                        onSubmit={(value) => {

                            gate.answer(value);
                            setPrompts(gate.prompts);

                        }}
                    />
                </Box>
            </Box>
        </Panel>
    );

}

/**
 * Final outcome; any key returns to the menu.
 */
function AddResult({ result, homeDir }: { result: AddEnvironmentResult; homeDir: string }): ReactElement {

    const { reset } = useRouter();
    const { isFocused } = useFocusScope('AddResult');

    useFocusedInput(isFocused, () => reset());

    const { identity } = result;
    const checks: StatusListItem[] = [];

    if (result.ssh) {

        checks.push({
            key: 'ssh',
            label: result.ssh.ok ? 'SSH authenticated' : 'SSH failed',
            status: result.ssh.ok ? 'success' : 'error',
            detail: result.ssh.detail,
        });

    }

    if (result.git) {

        checks.push({
            key: 'git',
            label: result.git.matches ? 'Git identity matches' : 'Git identity mismatch',
            status: result.git.matches ? 'success' : 'error',
            detail: `${result.git.name} <${result.git.email}>`,
        });

    }

    return (
        <Panel title={`Environment ${identity.id}`} tone={result.status === 'verified' ? 'success' : 'warning'} footer="Press any key to return to the menu">
            <Box flexDirection="column" gap={1}>
                {result.status === 'aborted' && <Text>Overwrite declined. Nothing was changed.</Text>}
                {result.status === 'unverified' && (
                    <Text color="yellow">Configured, but not verified (registration {result.gate ?? 'not confirmed'}).</Text>
                )}
                {checks.length > 0 && <StatusList items={checks} />}
                {result.status !== 'aborted' && (
                    <Box flexDirection="column">
                        <Text dimColor>Clone into {toHomeRelative(identity.codeDirectory, homeDir)} with:</Text>
                        <Text>  git clone git@{identity.sshHost}:OWNER/REPO.git</Text>
                    </Box>
                )}
                {result.warnings.length > 0 && (
                    <Box flexDirection="column">
                        {result.warnings.map((warning, index) => (
                            <Text key={index} color="yellow">⚠ {warning}</Text>
                        ))}
                    </Box>
                )}
            </Box>
        </Panel>
    );

}

function AddError({ message }: { message: string }): ReactElement {

    const { reset } = useRouter();
    const { isFocused } = useFocusScope('AddError');

    useFocusedInput(isFocused, () => reset());

    return (
        <Panel title="Add environment failed" tone="danger" footer="Press any key to return to the menu">
            <Text color="red">{message}</Text>
        </Panel>
    );

}

export function EnvAddScreen({ params }: ScreenProps): ReactElement {

    const { reset } = useRouter();
    const { ctx } = useAppContext();

    const [phase, setPhase] = useState<Phase>('form');
    const [input, setInput] = useState<AddEnvironmentInput | null>(null);
    const [steps, setSteps] = useState<StatusListItem[]>(initialSteps);
    const [collision, setCollision] = useState<Identity | null>(null);
    const [openGate, setOpenGate] = useState<OpenGate | null>(null);
    const [result, setResult] = useState<AddEnvironmentResult | null>(null);
    const [error, setError] = useState<string | null>(null);

    const overwriteRef = useRef<((accept: boolean) => void) | null>(null);
    const activeId = input ? sanitizeIdentityId(input.rawId) : null;

    useOnEvent('env:step', (data) => {

        if (data.id === activeId) setSteps((prev) => applyStepEvent(prev, data));

    }, [activeId]);

    useOnEvent('env:warning', (data) => {

        if (data.id === activeId) setSteps((prev) => applyWarningEvent(prev, data));

    }, [activeId]);

    useOnEvent('gate:changed', (data) => {

        if (data.id === activeId && data.state !== 'waiting') {

            setPhase((current) => (current === 'registration' ? 'running' : current));

        }

    }, [activeId]);

    useEffect(() => {

        if (!input) return;

        const controller = new AbortController();
        let cancelled = false;

        const hooks: AddEnvironmentHooks = {
            confirmOverwrite: (identity) => new Promise<boolean>((resolve) => {

                overwriteRef.current = resolve;
                setCollision(identity);
                setPhase('overwrite');

            }),
            awaitRegistration: (gate, prompt) => {

                setOpenGate({ gate, prompt });
                setPhase('registration');

            },
            signal: controller.signal,
        };

        const run = async () => {

            const [outcome, err] = await attempt(() => addEnvironment(ctx, input, hooks));

            if (cancelled) return;

            if (err) {

                setError(err.message);
                setPhase('error');

                return;

            }

            setResult(outcome);
            setPhase('done');

        };

        void run();

        return () => {

            cancelled = true;
            controller.abort();
            overwriteRef.current?.(false);

        };

    }, [ctx, input]);

    const answerOverwrite = (accept: boolean): void => {

        const resolve = overwriteRef.current;

        overwriteRef.current = null;
        setPhase('running');
        resolve?.(accept);

    };

    if (phase === 'form') {

        return (
            <Panel title="Add environment">
                <Form
                    focusLabel="AddForm"
                    submitLabel="Create"
                    fields={[
                        {
                            key: 'id',
                            label: 'Identity id',
                            required: true,
                            defaultValue: params.id,
                            placeholder: 'work',
                            validate: validateIdentityId,
                        },
                        { key: 'name', label: 'Git user name', required: true, placeholder: 'Jane Doe' },
                        // Any text, not checked for address format
                        { key: 'email', label: 'Git email', required: true, placeholder: 'jane@example.com' },
                    ]}
                    onSubmit={(values) => {

                        setInput({
                            rawId: values['id'] ?? '',
                            name: values['name'] ?? '',
                            email: values['email'] ?? '',
                        });
                        setPhase('running');

                    }}
                    onCancel={reset}
                />
            </Panel>
        );

    }

    if (phase === 'error') {

        return <AddError message={error ?? 'Unknown error'} />;

    }

    const homeDir = ctx.paths.homeDir;

    return (
        <Box flexDirection="column" gap={1}>
            <Panel title={`Environment ${activeId ?? ''}`}>
                <StatusList items={steps} />
            </Panel>

            {phase === 'overwrite' && collision && (
                <Confirm
                    title="Identity exists"
                    message={`Environment "${collision.id}" already exists. Replace its key and Git identity?`}
                    variant="warning"
                    focusLabel="OverwriteConfirm"
                    onConfirm={() => answerOverwrite(true)}
                    onCancel={() => answerOverwrite(false)}
                />
            )}

            {phase === 'registration' && openGate && (
                <RegistrationStep gate={openGate.gate} prompt={openGate.prompt} homeDir={homeDir} />
            )}

            {phase === 'done' && result && <AddResult result={result} homeDir={homeDir} />}
        </Box>
    );

}
