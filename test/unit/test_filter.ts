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

import assert from 'assert';
import { describe, it } from 'node:test';

import Doc from '../../lib/doc';
import Span from '../../lib/span';
import filterSpans from '../../lib/generic/filter';

const doc = Doc.fromWords(['a', 'b', 'c', 'd', 'e', 'f']);

function span(start : number, end : number, label : string) : Span {
    return new Span(doc, start, end, label);
}

function describeSpans(spans : Span[]) : string[] {
    return spans.map((s) => `${s.label}[${s.start},${s.end})`);
}

const TEST_CASES : Array<[string, Span[], string[]]> = [
    ['longer span wins',
     [span(0, 3, 'A'), span(1, 3, 'B')],
     ['A[0,3)']],
    ['longer span wins even when it comes later',
     [span(1, 3, 'B'), span(0, 3, 'A')],
     ['A[0,3)']],
    ['earlier span wins a tie',
     [span(1, 3, 'X'), span(2, 4, 'Y')],
     ['X[1,3)']],
    ['earlier span wins a tie, whatever its position',
     [span(2, 4, 'Y'), span(1, 3, 'X')],
     ['Y[2,4)']],
    ['adjacent spans are both kept',
     [span(2, 4, 'B'), span(0, 2, 'A')],
     ['A[0,2)', 'B[2,4)']],
    ['output is sorted by start',
     [span(4, 5, 'C'), span(0, 1, 'A'), span(2, 3, 'B')],
     ['A[0,1)', 'B[2,3)', 'C[4,5)']],
    ['a span blocked by a longer one does not block others',
     [span(0, 4, 'LONG'), span(3, 6, 'MID'), span(4, 6, 'SHORT')],
     ['LONG[0,4)', 'SHORT[4,6)']],
    ['identical ranges keep the first',
     [span(1, 2, 'FIRST'), span(1, 2, 'SECOND')],
     ['FIRST[1,2)']],
    ['empty input', [], []],
];

describe('filterSpans', () => {
    for (const [name, input, expected] of TEST_CASES) {
        it(name, () => {
            assert.deepStrictEqual(describeSpans(filterSpans(input)), expected);
        });
    }

    it('does not modify its input', () => {
        const input = [span(1, 3, 'B'), span(0, 3, 'A')];
        const output = filterSpans(input);
        assert.deepStrictEqual(describeSpans(input), ['B[1,3)', 'A[0,3)']);
        assert.notStrictEqual(output, input);
        assert.strictEqual(output[0], input[1]);
    });
});
