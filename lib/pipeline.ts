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

import type Doc from './doc';
import { ConfigurationError } from './errors';
import GenericMatcher from './generic/generic';
import { parseMatcherConfig } from './generic/config';
import Normalizer from './pipes/normalizer';
import Sentencizer from './pipes/sentencizer';
import Tokenizer from './tokenizer/base';

/**
 * A named stage of a pipeline.
 */
export interface PipelineComponent {
    readonly name : string;
    apply(doc : Doc) : Doc;
    /**
     * Set if the stage rewrites token norms; such stages also run on the
     * terms of matchers added after them.
     */
    readonly transformsNorms ?: boolean;
}

type Factory = (pipeline : Pipeline, name : string, config : unknown) => PipelineComponent;

const _factories = new Map<string, Factory>([
    ['sentencizer', (pipeline, name, config) => Sentencizer.fromConfig(name, config)],
    ['normalizer', (pipeline, name, config) => Normalizer.fromConfig(name, config)],
    ['matcher', (pipeline, name, config) => new GenericMatcher({
        pipeNames: pipeline.pipeNames,
        tokenize: (text) => pipeline.tokenizePattern(text)
    }, parseMatcherConfig(config), name)],
]);

export function getFactoryNames() : string[] {
    return Array.from(_factories.keys());
}

/**
 * A tokenizer followed by an ordered list of named stages.
 */
export default class Pipeline {
    readonly tokenizer : Tokenizer;
    private _stages : PipelineComponent[];

    constructor(tokenizer = new Tokenizer()) {
        this.tokenizer = tokenizer;
        this._stages = [];
    }

    get pipeNames() : string[] {
        return this._stages.map((stage) => stage.name);
    }

    getPipe(name : string) : PipelineComponent|undefined {
        return this._stages.find((stage) => stage.name === name);
    }

    /**
     * Create a stage with the given factory and append it to the pipeline.
     *
     * The stage is named after the factory unless a name is given.
     */
    addPipe(factory : string, name = factory, config : unknown = {}) : PipelineComponent {
        const create = _factories.get(factory);
        if (create === undefined)
            throw new ConfigurationError('unknown-factory', `Unknown pipeline factory "${factory}" (available: ${getFactoryNames().join(', ')})`);
        if (this.getPipe(name) !== undefined)
            throw new ConfigurationError('duplicate-stage', `A pipeline stage named "${name}" already exists`);

        const component = create(this, name, config);
        this._stages.push(component);
        return component;
    }

    make(text : string) : Doc {
        return this.tokenizer.tokenize(text);
    }

    process(text : string) : Doc {
        let doc = this.make(text);
        for (const stage of this._stages)
            doc = stage.apply(doc);
        return doc;
    }

    /**
     * Tokenize a term, and normalize it the same way as documents.
     */
    tokenizePattern(text : string) : Doc {
        let doc = this.make(text);
        for (const stage of this._stages) {
            if (stage.transformsNorms)
                doc = stage.apply(doc);
        }
        return doc;
    }
}
