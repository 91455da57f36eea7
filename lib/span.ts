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

import type { Document, Sentence, SpanLike } from './document';
import type { MatchSource } from './matchers/types';

export interface SpanJSON {
    start : number;
    end : number;
    label : string;
    text : string;
    source : MatchSource|null;
    score ?: number;
}

export default class Span implements SpanLike {
    readonly doc : Document;
    readonly start : number;
    readonly end : number;
    readonly label : string;
    readonly source : MatchSource|null;
    readonly score : number|null;

    constructor(doc : Document,
                start : number,
                end : number,
                label : string,
                source : MatchSource|null = null,
                score : number|null = null) {
        if (!(start >= 0 && start < end && end <= doc.length))
            throw new RangeError(`Invalid span [${start}, ${end}) over a document of ${doc.length} tokens`);
        this.doc = doc;
        this.start = start;
        this.end = end;
        this.label = label;
        this.source = source;
        this.score = score;
    }

    get length() : number {
        return this.end - this.start;
    }

    get text() : string {
        return this.doc.getText(this.start, this.end, 'TEXT');
    }

    get sentence() : Sentence {
        return this.doc.sentenceOf(this.start);
    }

    toString() : string {
        return this.text;
    }

    toJSON() : SpanJSON {
        const json : SpanJSON = {
            start: this.start,
            end: this.end,
            label: this.label,
            text: this.text,
            source: this.source,
        };
        if (this.score !== null)
            json.score = this.score;
        return json;
    }
}
