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

import { promises as pfs } from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

import { ConfigurationError } from './errors';
import Pipeline from './pipeline';
import Tokenizer from './tokenizer/base';
import { checkKnownKeys, expectObject, getString, isPlainObject } from './utils/config-utils';

export interface StageConfig {
    factory : string;
    name : string;
    config : unknown;
}

export interface PipelineConfig {
    stages : StageConfig[];
}

/**
 * Validate the contents of a pipeline configuration file.
 */
export function parsePipelineConfig(data : unknown) : PipelineConfig {
    const object = expectObject('pipeline configuration', data);
    checkKnownKeys('pipeline configuration', object, ['pipeline']);
    if (!Array.isArray(object.pipeline))
        throw new ConfigurationError('invalid-option', `Expected "pipeline" to be a list of stages`);

    const stages = object.pipeline.map((stage : unknown, i : number) : StageConfig => {
        if (!isPlainObject(stage))
            throw new ConfigurationError('invalid-option', `Expected pipeline stage #${i+1} to be an object`);
        checkKnownKeys(`pipeline stage #${i+1}`, stage, ['factory', 'name', 'config']);
        const factory = getString(`pipeline[${i}].factory`, stage.factory, '');
        if (!factory)
            throw new ConfigurationError('invalid-option', `Pipeline stage #${i+1} has no factory`);
        return {
            factory,
            name: getString(`pipeline[${i}].name`, stage.name, factory),
            config: stage.config ?? {}
        };
    });
    return { stages };
}

/**
 * Load a pipeline configuration file.
 *
 * Files ending in `.json` are parsed as JSON, anything else as YAML.
 */
export async function loadPipelineConfig(filename : string) : Promise<PipelineConfig> {
    const buffer = await pfs.readFile(filename, { encoding: 'utf8' });
    let data : unknown;
    try {
        if (path.extname(filename) === '.json')
            data = JSON.parse(buffer);
        else
            data = yaml.load(buffer, { filename });
    } catch(e) {
        // the compact form leaves out the multi-line source snippet
        const message = e instanceof yaml.YAMLException ? e.toString(true) : e instanceof Error ? e.message : String(e);
        throw new ConfigurationError('invalid-file', `Failed to parse ${filename}: ${message}`);
    }
    return parsePipelineConfig(data);
}

export function buildPipeline(config : PipelineConfig, tokenizer = new Tokenizer()) : Pipeline {
    const pipeline = new Pipeline(tokenizer);
    for (const stage of config.stages)
        pipeline.addPipe(stage.factory, stage.name, stage.config);
    return pipeline;
}
