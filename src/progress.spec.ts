import {
    suite,
    test,
} from '@testdeck/mocha';
import {
    createProgress,
    printReport,
} from './progress';
import type {
    Progress,
    ProgressStream,
} from './progress';
import {
    RunReport,
} from './report';
import {
    TaskStatus,
} from './task';
import assert = require('assert');
import stream = require('stream');

function collectingStream(tty: boolean): { stream: ProgressStream; text(): string } {
    const chunks: string[] = [];
    const writable = new stream.Writable({
        write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
            chunks.push(chunk.toString());
            callback();
        },
    });
    return {
        stream: Object.assign(writable, { columns: 10, isTTY: tty }),
        text: () => chunks.join(''),
    };
}

@suite('Progress')
export class ProgressTest {
    @test
    'prints one line per status without a terminal'(): void {
        const out = collectingStream(false);
        const progress = createProgress(out.stream);
        progress.status = '[1/2] cargoTest';
        progress.render();
        progress.write('output\n');
        progress.status = '[2/2] cargoFmt';
        progress.render();
        assert.strictEqual(out.text(), '[1/2] cargoTest\noutput\n[2/2] cargoFmt\n');
    }

    @test
    'truncates the status to the terminal width'(): void {
        const out = collectingStream(true);
        const progress = createProgress(out.stream);
        progress.status = '[1/12] cargoBuildRelease';
        progress.render();
        progress.write('x');
        assert.strictEqual(out.text(), '[1/12] ...\nx');
    }

    @test
    'printReport()'(): void {
        const written: string[] = [];
        const progress: Progress = {
            render: () => undefined,
            status: '',
            unrender: () => undefined,
            write: chunk => written.push(chunk.toString()),
        };
        printReport(progress, new RunReport([
            { description: 'a', durationMs: 3, error: 'boom', key: 'a', output: '', status: TaskStatus.Failed, upToDate: false },
        ]));
        assert.deepStrictEqual(written, ['failed    a [3ms]\n', '\nFailures:\n', '  a: boom\n']);
    }
}
