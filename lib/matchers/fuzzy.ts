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

import type { Attribute, Document } from '../document';
import similarityRatio from '../utils/edit-distance';
import StringStore from '../utils/string-store';

export interface FuzzyOptions {
    /**
     * Minimum similarity ratio (0-100) for a window to match.
     */
    minRatio : number;
    ignoreCase : boolean;
    /**
     * How many tokens a candidate window may have more or fewer than the
     * pattern; `'default'` is one less than the pattern length.
     */
    flex : number|'default';
}

export const FUZZY_ENGINE_DEFAULTS : Readonly<FuzzyOptions> = Object.freeze({
    minRatio: 75,
    ignoreCase: true,
    flex: 'default',
});

export interface FuzzyMatch {
    label : string;
    start : number;
    end : number;
    ratio : number;
}

interface FuzzyPattern {
    labelId : number;
    text : string;
    length : number;
}

interface Candidate {
    start : number;
    end : number;
    ratio : number;
}

function overlaps(one : Candidate, two : Candidate) : boolean {
    return one.start < two.end && two.start < one.end;
}

/**
 * Approximate matching of token sequences.
 *
 * Every window of tokens of about the length of a pattern is compared with
 * the pattern using {@link similarityRatio} over their text. For each
 * pattern, the best non-overlapping windows above the threshold are kept.
 */
export default class FuzzyMatcher {
    readonly attr : Attribute;
    readonly options : Readonly<FuzzyOptions>;
    private _labels : StringStore;
    private _patterns : FuzzyPattern[];

    constructor(attr : Attribute = 'TEXT', options : Partial<FuzzyOptions> = {}) {
        this.attr = attr;
        this.options = Object.freeze({ ...FUZZY_ENGINE_DEFAULTS, ...options });
        this._labels = new StringStore();
        this._patterns = [];
    }

    get size() : number {
        return this._patterns.length;
    }

    add(label : string, patterns : readonly Document[]) : void {
        const labelId = this._labels.add(label);
        for (const pattern of patterns) {
            if (pattern.length === 0)
                continue;
            this._patterns.push({
                labelId,
                text: this._prepare(pattern.getText(0, pattern.length, this.attr)),
                length: pattern.length
            });
        }
    }

    private _prepare(text : string) : string {
        return this.options.ignoreCase ? text.toLowerCase() : text;
    }

    private _flex(pattern : FuzzyPattern) : number {
        if (this.options.flex === 'default')
            return Math.max(pattern.length - 1, 0);
        return Math.max(this.options.flex, 0);
    }

    private _candidates(doc : Document, start : number, end : number, pattern : FuzzyPattern) : Candidate[] {
        const flex = this._flex(pattern);
        const minLength = Math.max(1, pattern.length - flex);
        const maxLength = pattern.length + flex;

        const candidates : Candidate[] = [];
        for (let i = start; i < end; i++) {
            for (let length = minLength; length <= maxLength && i + length <= end; length++) {
                const ratio = similarityRatio(this._prepare(doc.getText(i, i + length, this.attr)), pattern.text);
                if (ratio >= this.options.minRatio)
                    candidates.push({ start: i, end: i + length, ratio });
            }
        }

        // best first: higher ratio, then longer, then leftmost
        candidates.sort((a, b) => (b.ratio - a.ratio) || ((b.end - b.start) - (a.end - a.start)) || (a.start - b.start));
        const accepted : Candidate[] = [];
        for (const candidate of candidates) {
            if (!accepted.some((other) => overlaps(candidate, other)))
                accepted.push(candidate);
        }
        return accepted;
    }

    /**
     * Find the approximate occurrences of all patterns in `[start, end)`.
     *
     * Matches are sorted by start, then by end, then by label registration
     * order. If several patterns of the same label match the same range,
     * it is reported once, with the best ratio.
     */
    match(doc : Document, start = 0, end = doc.length) : FuzzyMatch[] {
        const best = new Map<string, { labelId : number, candidate : Candidate }>();
        for (const pattern of this._patterns) {
            for (const candidate of this._candidates(doc, start, end, pattern)) {
                const key = `${pattern.labelId}:${candidate.start}:${candidate.end}`;
                const existing = best.get(key);
                if (existing === undefined || existing.candidate.ratio < candidate.ratio)
                    best.set(key, { labelId: pattern.labelId, candidate });
            }
        }

        return Array.from(best.values())
            .sort((a, b) => (a.candidate.start - b.candidate.start) || (a.candidate.end - b.candidate.end) || (a.labelId - b.labelId))
            .map(({ labelId, candidate }) => ({
                label: this._labels.resolve(labelId),
                start: candidate.start,
                end: candidate.end,
                ratio: candidate.ratio
            }));
    }
}
