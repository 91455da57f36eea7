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

import type Doc from '../doc';
import type { PipelineComponent } from '../pipeline';
import { checkKnownKeys, expectObject, getBoolean } from '../utils/config-utils';

export interface NormalizerOptions {
    // lowercase the text
    lowercase : boolean;
    // remove diacritics
    accents : boolean;
    // replace typographic quotes with their ASCII equivalent
    quotes : boolean;
}

const DEFAULT_OPTIONS : Readonly<NormalizerOptions> = Object.freeze({
    lowercase: true,
    accents: true,
    quotes: true,
});

/**
 * Rewrite the normalized form of every token.
 *
 * With `lowercase`, the tokenizer's normalization (lowercasing, canonical
 * numbers) is the starting point; without it, the raw text is.
 */
export default class Normalizer implements PipelineComponent {
    readonly name : string;
    readonly options : Readonly<NormalizerOptions>;
    readonly transformsNorms = true;

    constructor(name = 'normalizer', options : Partial<NormalizerOptions> = {}) {
        this.name = name;
        this.options = Object.freeze({ ...DEFAULT_OPTIONS, ...options });
    }

    static fromConfig(name : string, config : unknown) : Normalizer {
        const object = expectObject('normalizer configuration', config);
        checkKnownKeys('normalizer', object, ['lowercase', 'accents', 'quotes']);
        return new Normalizer(name, {
            lowercase: getBoolean('lowercase', object.lowercase, DEFAULT_OPTIONS.lowercase),
            accents: getBoolean('accents', object.accents, DEFAULT_OPTIONS.accents),
            quotes: getBoolean('quotes', object.quotes, DEFAULT_OPTIONS.quotes),
        });
    }

    normalize(text : string) : string {
        if (this.options.accents)
            text = text.normalize('NFKD').replace(/\p{M}/gu, '');
        if (this.options.quotes)
            text = text.replace(/[‘’‚‛`´]/g, "'").replace(/[“”„‟«»]/g, '"');
        return text;
    }

    apply(doc : Doc) : Doc {
        for (const token of doc.tokens)
            doc.setNorm(token.i, this.normalize(this.options.lowercase ? token.norm : token.text));
        return doc;
    }
}
