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

import { buildPipeline, loadPipelineConfig } from '../lib/config-file';
import GenericMatcher from '../lib/generic/generic';
import type { ParsedArgs } from './lib/argutils';

export function initArgparse(subparsers : argparse.SubParser, parents : argparse.ArgumentParser[] = []) {
    const parser = subparsers.add_parser('check-config', {
        add_help: true,
        parents,
        description: "Check a pipeline configuration file, and list its stages and warnings."
    });
    parser.add_argument('-c', '--config', {
        required: true,
        help: 'Path to the pipeline configuration file (YAML or JSON)'
    });
}

export async function execute(args : ParsedArgs) {
    const pipeline = buildPipeline(await loadPipelineConfig(args.config));

    for (const name of pipeline.pipeNames) {
        const stage = pipeline.getPipe(name);
        console.log(name);
        if (stage instanceof GenericMatcher) {
            for (const diagnostic of stage.diagnostics)
                console.log(`  warning: ${diagnostic.message} [${diagnostic.code}]`);
        }
    }
}
