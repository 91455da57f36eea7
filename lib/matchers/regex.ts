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
    type AlignmentMode,
    type Attribute,
    type Document,
    type TextView,
    alignCharSpan,
    buildTextView,
} from '../document';
import { ConfigurationError } from '../errors';
import type { Match, MatchProducer } from './types';

interface RegexPattern {
    attr : Attribute;
    regex : RegExp;
}

export function compileRegex(label : string, pattern : string) : RegExp {
    try {
        return new RegExp(pattern, 'g');
    } catch(e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new ConfigurationError('invalid-regex', `Invalid regular expression for "${label}": ${message}`);
    }
}

/**
 * Regular expression matching over the text of a document.
 *
 * Each label has its own list of patterns and its own attribute: the
 * patterns run over the text view of that attribute, and the character
 * ranges they match are aligned back to tokens.
 */
export default class RegexMatcher implements MatchProducer {
    readonly alignmentMode : AlignmentMode;
    private _patterns : Map<string, RegexPattern[]>;

    constructor(alignmentMode : AlignmentMode = 'expand') {
        this.alignmentMode = alignmentMode;
        this._patterns = new Map;
    }

    add(label : string, patterns : readonly string[], attr : Attribute = 'TEXT') : void {
        let existing = this._patterns.get(label);
        if (!existing) {
            existing = [];
            this._patterns.set(label, existing);
        }
        for (const pattern of patterns)
            existing.push({ attr, regex: compileRegex(label, pattern) });
    }

    /**
     * Find all the matches of all patterns in `[start, end)`.
     *
     * Matches are reported label by label (in the order the labels were
     * added), pattern by pattern, and left to right within one pattern.
     * Empty matches and matches that cannot be aligned to tokens are skipped.
     */
    match(doc : Document, start = 0, end = doc.length) : Match[] {
        const views = new Map<Attribute, TextView>();
        const getView = (attr : Attribute) => {
            let view = views.get(attr);
            if (!view) {
                view = buildTextView(doc.tokens, start, end, attr);
                views.set(attr, view);
            }
            return view;
        };

        const matches : Match[] = [];
        for (const [label, patterns] of this._patterns) {
            for (const { attr, regex } of patterns) {
                const view = getView(attr);
                // matchAll works on a copy of the regex, so the compiled
                // pattern is never mutated
                for (const m of view.text.matchAll(regex)) {
                    if (m.index === undefined || m[0].length === 0)
                        continue;
                    const aligned = alignCharSpan(view, m.index, m.index + m[0].length, this.alignmentMode);
                    if (aligned === null)
                        continue;
                    matches.push({ label, start: aligned[0], end: aligned[1], source: 'regex' });
                }
            }
        }
        return matches;
    }
}
