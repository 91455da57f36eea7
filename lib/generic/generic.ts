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

import { type Logger, getLogger } from 'log4js';

import type { Document, Sentence } from '../document';
import type { Diagnostic } from '../errors';
import Span from '../span';
import { type AttributeMap, resolveAttributes } from './attributes';
import type { MatcherConfig } from './config';
import filterSpans from './filter';
import { type CompiledMatchState, type PatternTokenizer, compilePatterns } from './patterns';

export interface MatcherContext {
    /**
     * The names of the pipeline stages that run before this matcher.
     */
    pipeNames : readonly string[];
    tokenize : PatternTokenizer;
}

/**
 * The distinct sentences that contain at least one annotation, in the
 * order they are first found.
 */
function sentencesWithEntities(doc : Document) : Sentence[] {
    const seen = new Set<number>();
    const sentences : Sentence[] = [];
    for (const ent of doc.ents) {
        const sent = doc.sentenceOf(ent.start);
        if (seen.has(sent.index))
            continue;
        seen.add(sent.index);
        sentences.push(sent);
    }
    return sentences;
}

/**
 * A matcher for terms (exact or fuzzy) and regular expressions.
 *
 * All patterns are compiled when the matcher is constructed; any problem
 * with the configuration is reported then. Processing a document never
 * modifies the matcher.
 */
export default class GenericMatcher {
    readonly name : string;
    readonly config : MatcherConfig;
    readonly attributes : AttributeMap;
    readonly diagnostics : readonly Diagnostic[];
    private _state : CompiledMatchState;
    private _logger : Logger;

    constructor(context : MatcherContext,
                config : MatcherConfig,
                name = 'matcher',
                logger : Logger = getLogger('termspan.matcher')) {
        this.name = name;
        this.config = config;
        this._logger = logger;

        const resolved = resolveAttributes(config.attr, config.regex.keys(), context.pipeNames);
        const compiled = compilePatterns(config, resolved.attributes, context.tokenize);
        this.attributes = resolved.attributes;
        this._state = compiled.state;
        this.diagnostics = Object.freeze([...resolved.diagnostics, ...compiled.diagnostics]);

        for (const diagnostic of this.diagnostics)
            this._logger.warn(`${this.name}: ${diagnostic.message}`);
    }

    /**
     * Find the matching spans in a document.
     *
     * Term matches come first, then regex matches. If the matcher filters
     * matches, overlapping spans are then resolved with {@link filterSpans}.
     *
     * If the matcher only looks around existing entities, only the
     * sentences that contain one are scanned; a document without entities
     * has no matches.
     */
    process(doc : Document) : Span[] {
        let scopes : Array<[number, number]>;
        if (this.config.onEntsOnly)
            scopes = sentencesWithEntities(doc).map((sent) : [number, number] => [sent.start, sent.end]);
        else
            scopes = [[0, doc.length]];

        const spans : Span[] = [];
        for (const [start, end] of scopes) {
            for (const match of this._state.terms.match(doc, start, end))
                spans.push(new Span(doc, match.start, match.end, match.label, match.source, match.score ?? null));
        }
        for (const [start, end] of scopes) {
            for (const match of this._state.regex.match(doc, start, end))
                spans.push(new Span(doc, match.start, match.end, match.label, match.source));
        }
        this._logger.debug(`${this.name}: ${spans.length} candidate spans in ${scopes.length} scopes`);

        if (this.config.filterMatches)
            return filterSpans(spans);
        return spans;
    }

    /**
     * Replace the entities of a document with the spans found by
     * {@link process}.
     *
     * Existing entities are discarded, even those that determined which
     * sentences were scanned.
     */
    apply<D extends Document>(doc : D) : D {
        doc.ents = this.process(doc);
        return doc;
    }
}
