import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    CredentialRestoreError,
} from './errors';
import {
    RunReport,
    formatDuration,
} from './report';
import type {
    TaskReport,
} from './report';
import {
    TaskStatus,
} from './task';
import assert = require('assert');

function entry(key: string, status: TaskStatus, extra: Partial<TaskReport> = {}): TaskReport {
    return { description: key, durationMs: 0, key, output: '', status, upToDate: false, ...extra };
}

@suite('RunReport')
export class RunReportTest {
    @test
    'summaryLines()'(): void {
        const report = new RunReport([
            entry('cargoBuildRelease', TaskStatus.Succeeded, { durationMs: 1500 }),
            entry('cargoFmtCheck', TaskStatus.Succeeded, { upToDate: true }),
            entry('cargoTest', TaskStatus.Failed, { durationMs: 12, error: 'exit code 101' }),
            entry('cargoPublish/private-repo', TaskStatus.Skipped, { skippedBecause: 'cargoTest' }),
            entry('helmPush/charts', TaskStatus.Cancelled),
        ]);
        assert.deepStrictEqual(report.summaryLines(), [
            'succeeded cargoBuildRelease [1.5s]',
            'succeeded cargoFmtCheck (up to date)',
            'failed    cargoTest [12ms]',
            'skipped   cargoPublish/private-repo (dependency cargoTest did not succeed)',
            'cancelled helmPush/charts',
        ]);
        assert.deepStrictEqual(report.failureLines(), ['cargoTest: exit code 101']);
        assert.strictEqual(report.exitCode, 1);
    }

    @test
    'exitCode of a successful run'(): void {
        const report = new RunReport([entry('a', TaskStatus.Succeeded)]);
        assert.strictEqual(report.succeeded, true);
        assert.strictEqual(report.exitCode, 0);
    }

    @test
    'exitCode of a cancelled run'(): void {
        assert.strictEqual(new RunReport([entry('a', TaskStatus.Cancelled)], true).exitCode, 1);
    }

    @test
    'failureLines() of an aborted run'(): void {
        const fatal = new CredentialRestoreError('poetry.toml', new Error('denied'));
        const report = new RunReport([entry('a', TaskStatus.Failed)], false, fatal);
        assert.deepStrictEqual(report.failureLines(), [
            'a: failed',
            'aborted: failed to restore poetry.toml, credentials may be left on disk',
        ]);
    }

    @test
    'formatDuration()'(): void {
        assert.strictEqual(formatDuration(999), '999ms');
        assert.strictEqual(formatDuration(61234), '61.2s');
    }
}
