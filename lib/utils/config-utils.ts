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

// Helpers to validate configuration objects coming from user code or
// from configuration files.

import { ConfigurationError } from '../errors';

export function isPlainObject(value : unknown) : value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectObject(what : string, value : unknown) : Record<string, unknown> {
    if (value === undefined || value === null)
        return {};
    if (!isPlainObject(value))
        throw new ConfigurationError('invalid-option', `Expected ${what} to be an object`);
    return value;
}

export function checkKnownKeys(what : string, object : Record<string, unknown>, known : readonly string[]) : void {
    const unknown = Object.keys(object).filter((key) => !known.includes(key));
    if (unknown.length > 0)
        throw new ConfigurationError('unknown-option', `Unknown options for ${what}: ${unknown.join(', ')}`);
}

export function getBoolean(what : string, value : unknown, _default : boolean) : boolean {
    if (value === undefined || value === null)
        return _default;
    if (typeof value !== 'boolean')
        throw new ConfigurationError('invalid-option', `Expected ${what} to be a boolean, got ${JSON.stringify(value)}`);
    return value;
}

export function getNumber(what : string, value : unknown, _default : number) : number {
    if (value === undefined || value === null)
        return _default;
    if (typeof value !== 'number' || Number.isNaN(value))
        throw new ConfigurationError('invalid-option', `Expected ${what} to be a number, got ${JSON.stringify(value)}`);
    return value;
}

export function getString(what : string, value : unknown, _default : string) : string {
    if (value === undefined || value === null)
        return _default;
    if (typeof value !== 'string')
        throw new ConfigurationError('invalid-option', `Expected ${what} to be a string, got ${JSON.stringify(value)}`);
    return value;
}

/**
 * Coerce a mapping from label to a string or a list of strings into a
 * mapping from label to a list of strings.
 */
export function toMapOfLists(what : string, value : unknown) : ReadonlyMap<string, readonly string[]> {
    const map = new Map<string, readonly string[]>();
    for (const [key, entry] of Object.entries(expectObject(what, value))) {
        if (typeof entry === 'string') {
            map.set(key, Object.freeze([entry]));
        } else if (Array.isArray(entry) && entry.every((item) : item is string => typeof item === 'string')) {
            map.set(key, Object.freeze(entry.slice()));
        } else {
            throw new ConfigurationError('invalid-option',
                `Expected ${what}["${key}"] to be a string or a list of strings`);
        }
    }
    return map;
}
