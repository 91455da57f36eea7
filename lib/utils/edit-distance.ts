// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Genie
//
// Copyright 2020 The Board of Trustees of the Leland Stanford Junior University
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
//
// Author: Giovanni Campagna <gcampagn@cs.stanford.edu>

/**
 * Compute the insertion/deletion edit distance between two sequences.
 *
 * Unlike the Levenshtein distance, a substitution costs two operations
 * (one deletion and one insertion).
 */
export function indelDistance(one : string|readonly string[], two : string|readonly string[]) : number {
    if (typeof one === 'string' && typeof two === 'string') {
        if (one === two)
            return 0;
        if (one.indexOf(two) >= 0)
            return one.length-two.length;
        if (two.indexOf(one) >= 0)
            return two.length-one.length;
    }

    // only two rows of the matrix are needed at any time
    const C = two.length+1;
    let prev = new Array<number>(C);
    let curr = new Array<number>(C);
    for (let j = 0; j < C; j++)
        prev[j] = j;
    for (let i = 1; i <= one.length; i++) {
        curr[0] = i;
        for (let j = 1; j <= two.length; j++) {
            if (one[i-1] === two[j-1])
                curr[j] = prev[j-1];
            else
                curr[j] = 1 + Math.min(prev[j], curr[j-1]);
        }
        [prev, curr] = [curr, prev];
    }

    return prev[two.length];
}

/**
 * The similarity ratio of two strings, from 0 (nothing in common) to 100
 * (identical).
 *
 * This is `100 * (1 - d / (|a| + |b|))` where `d` is the indel distance.
 */
export default function similarityRatio(one : string, two : string) : number {
    const total = one.length + two.length;
    if (total === 0)
        return 100;
    return 100 * (total - indelDistance(one, two)) / total;
}
