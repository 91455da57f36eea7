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

export type MatchSource = 'exact' | 'fuzzy' | 'regex';

export interface Match {
    label : string;
    start : number;
    end : number;
    source : MatchSource;
    // similarity ratio, for fuzzy matches
    score ?: number;
}

/**
 * Anything that can find labeled matches in a token range of a document.
 *
 * Every engine is exposed to the matcher through this interface, whatever
 * its native way of reporting labels. Token indices are absolute in the
 * document, and `start`/`end` default to the whole document.
 */
export interface MatchProducer {
    match(doc : Document, start ?: number, end ?: number) : Match[];
}
