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

/**
 * The textual representation of a token that a matcher looks at.
 *
 * - `TEXT`: the raw text, with the original casing
 * - `NORM`: the normalized form computed by the tokenizer (and rewritten
 *   by the normalizer stage, if present)
 */
export type Attribute = 'TEXT' | 'NORM';

export function isAttribute(value : string) : value is Attribute {
    return value === 'TEXT' || value === 'NORM';
}

export interface Token {
    readonly i : number;
    readonly idx : number;
    readonly text : string;
    readonly norm : string;
    readonly whitespace : string;
    readonly isSentStart : boolean;
}

export interface Sentence {
    readonly index : number;
    readonly start : number;
    readonly end : number;
}

/**
 * A labeled, half-open token range over a document.
 */
export interface SpanLike {
    readonly doc : Document;
    readonly start : number;
    readonly end : number;
    readonly label : string;
}

/**
 * The view of a tokenized document that matchers depend on.
 *
 * Matchers read tokens, sentences and the existing annotations, and they
 * write only `ents`.
 */
export interface Document {
    readonly length : number;
    readonly tokens : readonly Token[];
    readonly sentences : readonly Sentence[];
    ents : readonly SpanLike[];

    sentenceOf(i : number) : Sentence;
    getText(start : number, end : number, attr : Attribute) : string;
}

/**
 * The string form of a token range under one attribute, with the
 * character offsets of every token in it.
 */
export interface TextView {
    text : string;
    // token indices, absolute in the document
    start : number;
    end : number;
    // character offsets in `text` of each token of the range
    starts : number[];
    ends : number[];
}

export function tokenAttr(token : Token, attr : Attribute) : string {
    return attr === 'TEXT' ? token.text : token.norm;
}

export function buildTextView(tokens : readonly Token[], start : number, end : number, attr : Attribute) : TextView {
    let text = '';
    const starts : number[] = [];
    const ends : number[] = [];
    for (let i = start; i < end; i++) {
        const token = tokens[i];
        starts.push(text.length);
        text += tokenAttr(token, attr);
        ends.push(text.length);
        if (i < end-1)
            text += token.whitespace;
    }
    return { text, start, end, starts, ends };
}

export type AlignmentMode = 'strict' | 'expand';

/**
 * Map a character range of a text view back to a token range.
 *
 * Returns null if the range does not cover any token, or, in strict mode,
 * if it does not start and end on token boundaries.
 */
export function alignCharSpan(view : TextView, charStart : number, charEnd : number, mode : AlignmentMode) : [number, number]|null {
    const n = view.starts.length;
    if (mode === 'strict') {
        const first = view.starts.indexOf(charStart);
        const last = view.ends.indexOf(charEnd);
        if (first < 0 || last < 0 || last < first)
            return null;
        return [view.start + first, view.start + last + 1];
    }

    let first = 0;
    while (first < n && view.ends[first] <= charStart)
        first++;
    let last = n-1;
    while (last >= 0 && view.starts[last] >= charEnd)
        last--;
    if (first >= n || last < first)
        return null;
    return [view.start + first, view.start + last + 1];
}
