/**
 * EnvListScreen - every environment with its checks.
 *
 * Probing runs once on mount; each identity is checked in turn, so the
 * spinner can take a few seconds per host.
 */
import { useState, useEffect } from 'react';
import { Box, Text } from 'ink';
import { attempt } from '@logosdx/utils';

import type { ReactElement } from 'react';
import type { ScreenProps } from '../../types.js';
import type { EnvironmentReport } from '../../../core/index.js';

import { useRouter } from '../../router.js';
import { useFocusScope } from '../../focus.js';
import { useFocusedInput } from '../../keyboard.js';
import { useAppContext } from '../../app-context.js';
import { Panel, Spinner, StatusList } from '../../components/index.js';
import { listEnvironments } from '../../../core/index.js';
import { reportLines } from './report.js';

type Phase = 'loading' | 'done' | 'error';

export function EnvListScreen({ params: _params }: ScreenProps): ReactElement {

    const { reset } = useRouter();
    const { isFocused } = useFocusScope('EnvList');
    const { ctx } = useAppContext();

    const [phase, setPhase] = useState<Phase>('loading');
    const [reports, setReports] = useState<EnvironmentReport[]>([]);
    const [error, setError] = useState<string | null>(null);

    useEffect(() => {

        let cancelled = false;

        const load = async () => {

            const [result, err] = await attempt(() => listEnvironments(ctx));

            if (cancelled) return;

            if (err) {

                setError(err.message);
                setPhase('error');

                return;

            }

            setReports(result);
            setPhase('done');

        };

        void load();

        return () => {

            cancelled = true;

        };

    }, [ctx]);

    useFocusedInput(isFocused, () => {

        if (phase !== 'loading') reset();

    });

    if (phase === 'loading') {

        return <Spinner label="Verifying environments..." />;

    }

    if (phase === 'error') {

        return (
            <Panel title="List & verify" tone="danger" footer="Press any key to return to the menu">
                <Text color="red">{error}</Text>
            </Panel>
        );

    }

    return (
        <Box flexDirection="column">
            {reports.length === 0 && <Text dimColor>No environments found</Text>}

            {reports.map((report) => {

                const allOk = report.ssh.ok && (report.git?.matches ?? false);

                return (
                    <Panel
                        key={report.identity.id}
                        title={`${report.identity.id}  ${report.identity.sshHost}`}
                        tone={allOk ? 'success' : 'warning'}
                    >
                        <StatusList items={reportLines(report, ctx.paths.homeDir)} />
                    </Panel>
                );

            })}

            <Box marginTop={1}>
                <Text dimColor>Press any key to return to the menu</Text>
            </Box>
        </Box>
    );

}
