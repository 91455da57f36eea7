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

import type { AlignmentMode } from '../document';
import { ConfigurationError } from '../errors';
import { FUZZY_ENGINE_DEFAULTS, type FuzzyOptions } from '../matchers/fuzzy';
import {
    checkKnownKeys,
    expectObject,
    getBoolean,
    getNumber,
    getString,
    isPlainObject,
    toMapOfLists,
} from '../utils/config-utils';
import type { AttributeSpec } from './attributes';

/**
 * Fuzzy matching options, as written in a configuration file.
 */
export interface RawFuzzyOptions {
    min_r2 ?: number;
    ignore_case ?: boolean;
    flex ?: number|'default';
}

/**
 * The configuration of a matcher stage, as written in a configuration file.
 */
export interface RawMatcherConfig {
    terms ?: Record<string, string|string[]>|null;
    regex ?: Record<string, string|string[]>|null;
    attr ?: AttributeSpec;
    fuzzy ?: boolean;
    fuzzy_kwargs ?: RawFuzzyOptions|null;
    filter_matches ?: boolean;
    on_ents_only ?: boolean;
    alignment_mode ?: AlignmentMode;
}

export interface MatcherConfig {
    readonly terms : ReadonlyMap<string, readonly string[]>;
    readonly regex : ReadonlyMap<string, readonly string[]>;
    readonly attr : AttributeSpec;
    // null if fuzzy matching is disabled
    readonly fuzzy : Readonly<FuzzyOptions>|null;
    readonly filterMatches : boolean;
    readonly onEntsOnly : boolean;
    readonly alignmentMode : AlignmentMode;
}

/**
 * The fuzzy options used when fuzzy matching is enabled without options.
 */
export const DEFAULT_FUZZY_OPTIONS : Readonly<FuzzyOptions> = Object.freeze({
    minRatio: 90,
    ignoreCase: true,
    flex: 'default',
});

const MATCHER_OPTIONS = ['terms', 'regex', 'attr', 'fuzzy', 'fuzzy_kwargs', 'filter_matches', 'on_ents_only', 'alignment_mode'];

function parseAttr(value : unknown) : AttributeSpec {
    if (value === undefined || value === null)
        return 'TEXT';
    if (typeof value === 'string')
        return value;
    if (isPlainObject(value)) {
        const mapping : Record<string, string> = {};
        for (const [key, item] of Object.entries(value)) {
            if (typeof item !== 'string')
                throw new ConfigurationError('invalid-option', `Expected attr["${key}"] to be a string`);
            mapping[key] = item;
        }
        return Object.freeze(mapping);
    }
    throw new ConfigurationError('invalid-option', `Expected attr to be a string or a mapping of strings`);
}

function parseFlex(value : unknown) : number|'default' {
    if (value === 'default')
        return value;
    const flex = getNumber('fuzzy_kwargs.flex', value, 0);
    if (!Number.isInteger(flex) || flex < 0)
        throw new ConfigurationError('invalid-option', `Expected fuzzy_kwargs.flex to be a non-negative integer or "default"`);
    return flex;
}

function parseFuzzy(enabled : boolean, value : unknown) : Readonly<FuzzyOptions>|null {
    if (!enabled)
        return null;
    if (value === undefined || value === null)
        return DEFAULT_FUZZY_OPTIONS;

    const raw = expectObject('fuzzy_kwargs', value);
    checkKnownKeys('fuzzy_kwargs', raw, ['min_r2', 'ignore_case', 'flex']);
    const minRatio = getNumber('fuzzy_kwargs.min_r2', raw.min_r2, FUZZY_ENGINE_DEFAULTS.minRatio);
    if (minRatio < 0 || minRatio > 100)
        throw new ConfigurationError('invalid-option', `Expected fuzzy_kwargs.min_r2 to be between 0 and 100`);
    return Object.freeze({
        minRatio,
        ignoreCase: getBoolean('fuzzy_kwargs.ignore_case', raw.ignore_case, FUZZY_ENGINE_DEFAULTS.ignoreCase),
        flex: raw.flex === undefined ? FUZZY_ENGINE_DEFAULTS.flex : parseFlex(raw.flex),
    });
}

function parseAlignmentMode(value : unknown) : AlignmentMode {
    const mode = getString('alignment_mode', value, 'expand');
    if (mode !== 'expand' && mode !== 'strict')
        throw new ConfigurationError('invalid-option', `Expected alignment_mode to be "expand" or "strict", got "${mode}"`);
    return mode;
}

/**
 * Validate a raw matcher configuration, and convert it to its canonical
 * form.
 *
 * Terms and regex given as a single string become one-element lists.
 * Fuzzy options are only kept if fuzzy matching is enabled.
 */
export function parseMatcherConfig(raw : RawMatcherConfig|unknown) : MatcherConfig {
    const object = expectObject('matcher configuration', raw);
    checkKnownKeys('matcher', object, MATCHER_OPTIONS);

    return Object.freeze({
        terms: toMapOfLists('terms', object.terms),
        regex: toMapOfLists('regex', object.regex),
        attr: parseAttr(object.attr),
        fuzzy: parseFuzzy(getBoolean('fuzzy', object.fuzzy, false), object.fuzzy_kwargs),
        filterMatches: getBoolean('filter_matches', object.filter_matches, true),
        onEntsOnly: getBoolean('on_ents_only', object.on_ents_only, false),
        alignmentMode: parseAlignmentMode(object.alignment_mode),
    });
}
