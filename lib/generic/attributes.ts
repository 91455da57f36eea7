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

import { type Attribute, isAttribute } from '../document';
import { ConfigurationError, type Diagnostic, warning } from '../errors';

/**
 * The key of the attribute mapping that selects the attribute used to
 * match terms. All other keys are regex labels.
 */
export const TERM_ATTR = 'term_attr';

/**
 * The attribute of the labels missing from an attribute mapping.
 */
export const DEFAULT_ATTR : Attribute = 'NORM';

/**
 * The name of the pipeline stage that produces normalized text.
 */
export const NORMALIZER_STAGE = 'normalizer';

/**
 * Either one attribute for everything, or a mapping from regex label
 * (or {@link TERM_ATTR}) to attribute.
 */
export type AttributeSpec = string | Readonly<Record<string, string>>;

export type AttributeMap = ReadonlyMap<string, Attribute>;

export interface ResolvedAttributes {
    attributes : AttributeMap;
    diagnostics : Diagnostic[];
}

/**
 * Decide which attribute each regex label, and the terms, are matched
 * against.
 *
 * Throws a {@link ConfigurationError} if any resolved value is not a
 * supported attribute. Other problems are reported as diagnostics.
 */
export function resolveAttributes(attr : AttributeSpec,
                                  regexLabels : Iterable<string>,
                                  pipeNames : readonly string[]) : ResolvedAttributes {
    const keys = Array.from(new Set([...regexLabels, TERM_ATTR]));
    const diagnostics : Diagnostic[] = [];

    const raw = new Map<string, string>();
    if (typeof attr === 'string') {
        // the same attribute for every term and regex
        for (const key of keys)
            raw.set(key, attr.toUpperCase());
    } else {
        const unknown : string[] = [];
        for (const [key, value] of Object.entries(attr)) {
            if (keys.includes(key))
                raw.set(key, value.toUpperCase());
            else
                unknown.push(key);
        }
        for (const key of keys) {
            if (!raw.has(key))
                raw.set(key, DEFAULT_ATTR);
        }
        if (unknown.length > 0) {
            diagnostics.push(warning('unknown-attribute-key',
                `some of 'attr' keys are not in 'regex' keys and will be ignored: ${unknown.join(', ')}`));
        }
    }

    const attributes = new Map<string, Attribute>();
    const invalid : string[] = [];
    for (const key of keys) {
        const value = raw.get(key) ?? DEFAULT_ATTR;
        if (isAttribute(value))
            attributes.set(key, value);
        else
            invalid.push(`${key}: ${value}`);
    }
    if (invalid.length > 0)
        throw new ConfigurationError('unsupported-attribute', `Some attributes in 'attr' are not supported: ${invalid.join(', ')}`);

    const usesNorm = Array.from(attributes.values()).includes('NORM');
    if (usesNorm && !pipeNames.includes(NORMALIZER_STAGE))
        diagnostics.push(warning('missing-normalizer', 'You are using the NORM attribute but no normalizer is set.'));

    return { attributes, diagnostics };
}

export function getAttribute(attributes : AttributeMap, key : string) : Attribute {
    return attributes.get(key) ?? DEFAULT_ATTR;
}
