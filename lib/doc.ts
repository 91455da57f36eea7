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

import {
    type Attribute,
    type Document,
    type Sentence,
    type SpanLike,
    type Token,
    buildTextView,
} from './document';

export interface TokenData {
    idx : number;
    text : string;
    norm : string;
    whitespace : string;
}

interface DocToken {
    i : number;
    idx : number;
    text : string;
    norm : string;
    whitespace : string;
    isSentStart : boolean;
}

interface SentenceCache {
    sentences : Sentence[];
    // sentence index of each token
    index : number[];
}

function computeSentences(tokens : readonly DocToken[]) : SentenceCache {
    const sentences : Sentence[] = [];
    const index : number[] = [];
    let start = 0;
    for (let i = 1; i <= tokens.length; i++) {
        if (i === tokens.length || tokens[i].isSentStart) {
            sentences.push({ index: sentences.length, start, end: i });
            start = i;
        }
    }
    for (const sent of sentences) {
        for (let i = sent.start; i < sent.end; i++)
            index.push(sent.index);
    }
    return { sentences, index };
}

/**
 * A tokenized document.
 *
 * A freshly constructed document is one sentence; the sentencizer stage
 * splits it further.
 */
export default class Doc implements Document {
    readonly text : string;
    private _tokens : DocToken[];
    private _ents : readonly SpanLike[];
    private _sentences : SentenceCache|null;

    constructor(text : string, tokens : readonly TokenData[]) {
        this.text = text;
        this._tokens = tokens.map((tok, i) => ({
            i,
            idx: tok.idx,
            text: tok.text,
            norm: tok.norm,
            whitespace: tok.whitespace,
            isSentStart: i === 0
        }));
        this._ents = [];
        this._sentences = null;
    }

    /**
     * Build a document from pre-split words.
     *
     * `spaces[i]` says whether word `i` is followed by a single space; it
     * defaults to true for every word but the last.
     */
    static fromWords(words : readonly string[], spaces ?: readonly boolean[]) : Doc {
        let text = '';
        const tokens : TokenData[] = [];
        words.forEach((word, i) => {
            const space = spaces ? spaces[i] : i < words.length-1;
            tokens.push({ idx: text.length, text: word, norm: word.toLowerCase(), whitespace: space ? ' ' : '' });
            text += word + (space ? ' ' : '');
        });
        return new Doc(text, tokens);
    }

    get length() : number {
        return this._tokens.length;
    }

    get tokens() : readonly Token[] {
        return this._tokens;
    }

    get ents() : readonly SpanLike[] {
        return this._ents;
    }

    set ents(spans : readonly SpanLike[]) {
        for (const span of spans) {
            if (span.doc !== this)
                throw new Error(`Span "${span.label}" [${span.start}, ${span.end}) belongs to a different document`);
            if (!(span.start >= 0 && span.start < span.end && span.end <= this.length))
                throw new RangeError(`Span "${span.label}" [${span.start}, ${span.end}) is out of bounds`);
        }
        this._ents = spans.slice();
    }

    get sentences() : readonly Sentence[] {
        return this._getSentences().sentences;
    }

    sentenceOf(i : number) : Sentence {
        if (i < 0 || i >= this.length)
            throw new RangeError(`Token index ${i} is out of bounds`);
        const cache = this._getSentences();
        return cache.sentences[cache.index[i]];
    }

    getText(start : number, end : number, attr : Attribute) : string {
        return buildTextView(this._tokens, start, end, attr).text;
    }

    setNorm(i : number, norm : string) : void {
        this._tokens[i].norm = norm;
    }

    setSentStart(i : number, value : boolean) : void {
        // the first token always starts a sentence
        if (i === 0)
            return;
        this._tokens[i].isSentStart = value;
        this._sentences = null;
    }

    private _getSentences() : SentenceCache {
        if (this._sentences === null)
            this._sentences = computeSentences(this._tokens);
        return this._sentences;
    }
}
