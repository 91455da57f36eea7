// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Termspan
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { after, describe, it } from 'node:test';

import * as Annotate from '../../tool/annotate';
import * as CheckConfig from '../../tool/check-config';
import { type ParsedArgs, maybeCreateReadStream, maybeCreateWriteStream } from '../../tool/lib/argutils';
import { makeParser, run } from '../../tool/termspan';

const DATA_DIR = path.resolve(__dirname, '../data');
const PIPELINE = path.resolve(DATA_DIR, 'pipeline.yaml');

const tmpdir = fs.mkdtempSync(path.join(os.tmpdir(), 'termspan-'));
after(() => {
    fs.rmSync(tmpdir, { recursive: true, force: true });
});

function writeFile(name : string, content : string) : string {
    const filename = path.join(tmpdir, name);
    fs.writeFileSync(filename, content);
    return filename;
}

function readJSONLines(filename : string) : unknown[] {
    return fs.readFileSync(filename, { encoding: 'utf8' }).split('\n').filter((line) => line !== '').map((line) => JSON.parse(line));
}

describe('command line', () => {
    const TEST_CASES : Array<[string[], string]> = [
        // arguments, log level
        [['annotate', '-c', 'x.yaml', 'in.txt'], 'warn'],
        [['annotate', '-c', 'x.yaml', '--log-level', 'debug', 'in.txt'], 'debug'],
        [['--log-level', 'error', 'annotate', '-c', 'x.yaml', 'in.txt'], 'error'],
        [['check-config', '--log-level', 'info', '-c', 'x.yaml'], 'info'],
    ];

    for (const [argv, level] of TEST_CASES) {
        it(`parses "${argv.join(' ')}"`, () => {
            const args : ParsedArgs = makeParser().parse_args(argv);
            assert.strictEqual(args.log_level, level);
            assert.strictEqual(args.subcommand, argv.includes('annotate') ? 'annotate' : 'check-config');
            assert.strictEqual(args.config, 'x.yaml');
        });
    }

    it('maps "-" to the standard streams', () => {
        assert.strictEqual(maybeCreateReadStream('-'), process.stdin);
        assert.strictEqual(maybeCreateWriteStream('-'), process.stdout);
        assert.strictEqual(maybeCreateWriteStream(undefined), process.stdout);
    });
});

describe('annotate', () => {
    it('writes one JSON line per non-blank input line', async () => {
        const first = writeFile('first.txt', 'Take Aspirin 200 mg.\n   \nNo drugs here\n');
        const second = writeFile('second.txt', '\nIbuprofen 50mg\n');
        const output = path.join(tmpdir, 'annotated.jsonl');

        await Annotate.execute({ subcommand: 'annotate', config: PIPELINE, log_level: 'warn', output, input: [first, second] });

        assert.deepStrictEqual(readJSONLines(output), [
            {
                text: 'Take Aspirin 200 mg.',
                ents: [
                    { start: 1, end: 2, label: 'DRUG', text: 'Aspirin', source: 'exact' },
                    { start: 2, end: 4, label: 'DOSE', text: '200 mg', source: 'regex' },
                ]
            },
            { text: 'No drugs here', ents: [] },
            {
                text: 'Ibuprofen 50mg',
                ents: [
                    { start: 0, end: 1, label: 'DRUG', text: 'Ibuprofen', source: 'exact' },
                    { start: 1, end: 3, label: 'DOSE', text: '50mg', source: 'regex' },
                ]
            },
        ]);
    });

    it('rejects when an input file cannot be read', async () => {
        const output = path.join(tmpdir, 'missing.jsonl');
        await assert.rejects(Annotate.execute({
            subcommand: 'annotate',
            config: PIPELINE,
            log_level: 'warn',
            output,
            input: [path.join(tmpdir, 'does-not-exist.txt')]
        }), (e : unknown) => e instanceof Error && 'code' in e && e.code === 'ENOENT');
        assert.strictEqual(fs.readFileSync(output, { encoding: 'utf8' }), '');
    });
});

describe('check-config', () => {
    it('lists the stages and their warnings', async (t) => {
        const config = writeFile('codes.json', JSON.stringify({
            pipeline: [
                { factory: 'sentencizer' },
                { factory: 'matcher', name: 'codes', config: { terms: { CODE: 'A1' }, attr: 'NORM' } },
            ]
        }));
        const log = t.mock.method(console, 'log', () => {});

        await CheckConfig.execute({ subcommand: 'check-config', config, log_level: 'warn' });

        assert.deepStrictEqual(log.mock.calls.map((call) => call.arguments), [
            ['sentencizer'],
            ['codes'],
            ['  warning: You are using the NORM attribute but no normalizer is set. [missing-normalizer]'],
        ]);
    });

    it('reports an invalid configuration on one line and fails', async (t) => {
        const error = t.mock.method(console, 'error', () => {});
        try {
            await run({ subcommand: 'check-config', config: path.resolve(DATA_DIR, 'invalid.yaml'), log_level: 'warn' });

            assert.strictEqual(process.exitCode, 1);
            assert.strictEqual(error.mock.calls.length, 1);
            const [message] = error.mock.calls[0].arguments;
            assert.strictEqual(typeof message, 'string');
            assert(String(message).startsWith('Invalid configuration: Failed to parse '));
            assert(!String(message).includes('\n'));
        } finally {
            process.exitCode = 0;
        }
    });
});
