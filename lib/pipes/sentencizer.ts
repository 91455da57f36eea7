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
import { ConfigurationError } from '../errors';

const DEFAULT_PUNCT_CHARS = ['.', '!', '?', '…'];

/**
 * Split documents into sentences.
 *
 * A sentence ends after a run of sentence-final punctuation, and, if
 * `newlines` is set, after any token followed by a line break.
 */
export default class Sentencizer implements PipelineComponent {
    readonly name : string;
    readonly punctChars : readonly string[];
    readonly newlines : boolean;

    constructor(name = 'sentencizer', punctChars : readonly string[] = DEFAULT_PUNCT_CHARS, newlines = true) {
        this.name = name;
        this.punctChars = punctChars;
        this.newlines = newlines;
    }

    static fromConfig(name : string, config : unknown) : Sentencizer {
        const object = expectObject('sentencizer configuration', config);
        checkKnownKeys('sentencizer', object, ['punct_chars', 'newlines']);

        let punctChars = DEFAULT_PUNCT_CHARS;
        if (object.punct_chars !== undefined) {
            const value = object.punct_chars;
            if (!Array.isArray(value) || !value.every((item) : item is string => typeof item === 'string'))
                throw new ConfigurationError('invalid-option', 'Expected punct_chars to be a list of strings');
            punctChars = value;
        }
        return new Sentencizer(name, punctChars, getBoolean('newlines', object.newlines, true));
    }

    apply(doc : Doc) : Doc {
        const tokens = doc.tokens;
        for (let i = 0; i < tokens.length-1; i++) {
            const isPunct = this.punctChars.includes(tokens[i].text);
            const nextIsPunct = this.punctChars.includes(tokens[i+1].text);
            if ((isPunct && !nextIsPunct) || (this.newlines && tokens[i].whitespace.includes('\n')))
                doc.setSentStart(i+1, true);
        }
        return doc;
    }
}
