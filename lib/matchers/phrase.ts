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

import { type Attribute, type Document, tokenAttr } from '../document';
import StringStore from '../utils/string-store';
import Trie from '../utils/trie';

/**
 * A phrase match: label identifier, start token, end token (exclusive).
 */
export type PhraseMatch = [number, number, number];

function addId(ids : Set<number>|undefined, id : number) : Set<number> {
    if (ids === undefined)
        ids = new Set;
    ids.add(id);
    return ids;
}

/**
 * Exact matching of token sequences.
 *
 * Patterns are tokenized documents; a pattern matches wherever the sequence
 * of its token attributes occurs in the document. Labels are interned in a
 * {@link StringStore}, and matches report the label identifier.
 */
export default class PhraseMatcher {
    readonly attr : Attribute;
    readonly strings : StringStore;
    private _trie : Trie<string, number, Set<number>>;
    private _size : number;

    constructor(attr : Attribute = 'TEXT', strings = new StringStore()) {
        this.attr = attr;
        this.strings = strings;
        this._trie = new Trie(addId);
        this._size = 0;
    }

    /**
     * The number of patterns added so far.
     */
    get size() : number {
        return this._size;
    }

    add(label : string, patterns : readonly Document[]) : void {
        const id = this.strings.add(label);
        for (const pattern of patterns) {
            // an empty pattern would match everywhere
            if (pattern.length === 0)
                continue;
            this._trie.insert(pattern.tokens.map((tok) => tokenAttr(tok, this.attr)), id);
            this._size ++;
        }
    }

    /**
     * Find all the occurrences of all patterns in `[start, end)`.
     *
     * Matches are sorted by start, then by end, then by label identifier.
     * Overlapping matches are all reported.
     */
    match(doc : Document, start = 0, end = doc.length) : PhraseMatch[] {
        const keys = doc.tokens.slice(start, end).map((tok) => tokenAttr(tok, this.attr));
        const matches : PhraseMatch[] = [];
        for (let i = 0; i < keys.length; i++) {
            for (const [j, ids] of this._trie.prefixes(keys, i)) {
                for (const id of Array.from(ids).sort((a, b) => a - b))
                    matches.push([id, start + i, start + j]);
            }
        }
        return matches;
    }
}
