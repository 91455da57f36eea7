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

import type { Document } from '../document';
import { type Diagnostic, warning } from '../errors';
import FuzzyMatcher from '../matchers/fuzzy';
import PhraseMatcher from '../matchers/phrase';
import RegexMatcher from '../matchers/regex';
import type { Match, MatchProducer } from '../matchers/types';
import { type AttributeMap, TERM_ATTR, getAttribute } from './attributes';
import type { MatcherConfig } from './config';

/**
 * Turns a term into a tokenized pattern.
 */
export type PatternTokenizer = (text : string) => Document;

/**
 * The matchers built from a configuration.
 *
 * The state is frozen once built: nothing can add patterns to it, and
 * matching does not modify it, so it can be shared by any number of
 * documents.
 */
export interface CompiledMatchState {
    readonly terms : MatchProducer;
    readonly regex : MatchProducer;
}

export interface CompiledPatterns {
    state : CompiledMatchState;
    diagnostics : Diagnostic[];
}

// the phrase matcher reports label identifiers, which we resolve here
class ExactMatchProducer implements MatchProducer {
    private _matcher : PhraseMatcher;

    constructor(matcher : PhraseMatcher) {
        this._matcher = matcher;
    }

    match(doc : Document, start = 0, end = doc.length) : Match[] {
        return this._matcher.match(doc, start, end).map(([id, matchStart, matchEnd]) : Match => ({
            label: this._matcher.strings.resolve(id),
            start: matchStart,
            end: matchEnd,
            source: 'exact'
        }));
    }
}

class FuzzyMatchProducer implements MatchProducer {
    private _matcher : FuzzyMatcher;

    constructor(matcher : FuzzyMatcher) {
        this._matcher = matcher;
    }

    match(doc : Document, start = 0, end = doc.length) : Match[] {
        return this._matcher.match(doc, start, end).map((match) : Match => ({
            label: match.label,
            start: match.start,
            end: match.end,
            source: 'fuzzy',
            score: match.ratio
        }));
    }
}

/**
 * Build the term and regex matchers of a matcher configuration.
 *
 * Terms are tokenized with `tokenize` and matched against the attribute
 * of {@link TERM_ATTR}; each regex label is matched against its own
 * attribute.
 */
export function compilePatterns(config : MatcherConfig,
                                attributes : AttributeMap,
                                tokenize : PatternTokenizer) : CompiledPatterns {
    const diagnostics : Diagnostic[] = [];
    const termAttr = getAttribute(attributes, TERM_ATTR);

    let terms : MatchProducer;
    if (config.fuzzy !== null) {
        diagnostics.push(warning('fuzzy-performance',
            'You have requested fuzzy matching, which significantly increases compute times (x60 increases are common).'));
        const matcher = new FuzzyMatcher(termAttr, config.fuzzy);
        for (const [label, expressions] of config.terms)
            matcher.add(label, expressions.map(tokenize));
        terms = new FuzzyMatchProducer(matcher);
    } else {
        const matcher = new PhraseMatcher(termAttr);
        for (const [label, expressions] of config.terms)
            matcher.add(label, expressions.map(tokenize));
        terms = new ExactMatchProducer(matcher);
    }

    const regex = new RegexMatcher(config.alignmentMode);
    for (const [label, patterns] of config.regex)
        regex.add(label, patterns, getAttribute(attributes, label));

    return {
        state: Object.freeze({ terms, regex }),
        diagnostics
    };
}
