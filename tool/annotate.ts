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

import * as argparse from 'argparse';
import byline from 'byline';
import Stream from 'stream';
import { finished, pipeline as streamPipeline } from 'stream/promises';
import { getLogger } from 'log4js';

import { buildPipeline, loadPipelineConfig } from '../lib/config-file';
import Pipeline from '../lib/pipeline';
import Span from '../lib/span';
import { type ParsedArgs, maybeCreateReadStream, maybeCreateWriteStream } from './lib/argutils';

const logger = getLogger('termspan.annotate');

/**
 * Turns lines of text into JSON lines with their entities.
 */
class Annotator extends Stream.Transform {
    private _pipeline : Pipeline;
    private _count : number;

    constructor(pipeline : Pipeline) {
        super({
            writableObjectMode: true,
            readableObjectMode: false
        });
        this._pipeline = pipeline;
        this._count = 0;
    }

    get count() : number {
        return this._count;
    }

    _transform(line : string, encoding : BufferEncoding, callback : (err ?: Error|null) => void) {
        if (/^\s*$/.test(line)) {
            callback();
            return;
        }

        try {
            const doc = this._pipeline.process(line);
            const ents = doc.ents.map((ent) => {
                if (ent instanceof Span)
                    return ent.toJSON();
                return { start: ent.start, end: ent.end, label: ent.label, text: doc.getText(ent.start, ent.end, 'TEXT'), source: null };
            });
            this._count ++;
            this.push(JSON.stringify({ text: doc.text, ents }) + '\n');
            callback();
        } catch(e) {
            callback(e instanceof Error ? e : new Error(String(e)));
        }
    }
}

export function initArgparse(subparsers : argparse.SubParser, parents : argparse.ArgumentParser[] = []) {
    const parser = subparsers.add_parser('annotate', {
        add_help: true,
        parents,
        description: "Annotate each line of the input files, and write the entities as JSON lines."
    });
    parser.add_argument('-c', '--config', {
        required: true,
        help: 'Path to the pipeline configuration file (YAML or JSON)'
    });
    parser.add_argument('-o', '--output', {
        required: false,
        help: 'Path to the output file (defaults to standard output)'
    });
    parser.add_argument('input', {
        nargs: '+',
        help: 'Input files, one document per line ("-" for standard input)'
    });
}

export async function execute(args : ParsedArgs) {
    const pipeline = buildPipeline(await loadPipelineConfig(args.config));
    logger.info(`Loaded pipeline: ${pipeline.pipeNames.join(', ')}`);

    const output = maybeCreateWriteStream(args.output);
    try {
        for (const filename of args.input ?? []) {
            const annotator = new Annotator(pipeline);
            annotator.pipe(output, { end: false });
            // read errors and annotation errors reject here
            await streamPipeline(maybeCreateReadStream(filename).setEncoding('utf8'), byline(), annotator);
            await finished(annotator);
            logger.info(`${filename}: annotated ${annotator.count} documents`);
        }
    } finally {
        if (output !== process.stdout) {
            output.end();
            await finished(output);
        }
    }
}
