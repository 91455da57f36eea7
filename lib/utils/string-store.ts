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
 * A two-way mapping between strings and small integer identifiers.
 *
 * Identifiers are assigned in insertion order, starting at 0.
 */
export default class StringStore {
    private _ids : Map<string, number>;
    private _strings : string[];

    constructor(strings : Iterable<string> = []) {
        this._ids = new Map;
        this._strings = [];

        for (const string of strings)
            this.add(string);
    }

    get size() : number {
        return this._strings.length;
    }

    add(string : string) : number {
        const existing = this._ids.get(string);
        if (existing !== undefined)
            return existing;
        const id = this._strings.length;
        this._strings.push(string);
        this._ids.set(string, id);
        return id;
    }

    resolve(id : number) : string {
        if (id < 0 || id >= this._strings.length)
            throw new RangeError(`Unknown string identifier ${id}`);
        return this._strings[id];
    }
}
