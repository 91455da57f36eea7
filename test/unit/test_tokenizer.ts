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

import Tokenizer from '../../lib/tokenizer/base';

const TEST_CASES : Array<[string, string[], string[]]> = [
    // input, raw tokens, normalized tokens
    ['Hello World', ['Hello', 'World'], ['hello', 'world']],
    ['Take 50mg now', ['Take', '50', 'mg', 'now'], ['take', '50', 'mg', 'now']],
    ['Hi, there!', ['Hi', ',', 'there', '!'], ['hi', ',', 'there', '!']],
    ['Dr. Smith', ['Dr.', 'Smith'], ['dr.', 'smith']],
    ['take 007 or 1.50', ['take', '007', 'or', '1.50'], ['take', '7', 'or', '1.5']],
    ['mail Bob@Example.com', ['mail', 'Bob@Example.com'], ['mail', 'bob@example.com']],
    ['see https://example.com/a, ok', ['see', 'https://example.com/a', ',', 'ok'], ['see', 'https://example.com/a', ',', 'ok']],
    ["at five o'clock", ['at', 'five', "o'clock"], ['at', 'five', "o'clock"]],
    ['dose .5 or +3', ['dose', '.5', 'or', '+3'], ['dose', '0.5', 'or', '3']],
    ['lot -0.0 and -07.250', ['lot', '-0.0', 'and', '-07.250'], ['lot', '0', 'and', '-7.25']],
    ['code 12345678901234567890123', ['code', '12345678901234567890123'], ['code', '12345678901234567890123']],
    ['from Besançon, Crème', ['from', 'Besançon', ',', 'Crème'], ['from', 'besançon', ',', 'crème']],
];

describe('Tokenizer', () => {
    const tokenizer = new Tokenizer();

    for (const [input, raw, normalized] of TEST_CASES) {
        it(`tokenizes "${input}"`, () => {
            const doc = tokenizer.tokenize(input);
            assert.deepStrictEqual(doc.tokens.map((tok) => tok.text), raw);
            assert.deepStrictEqual(doc.tokens.map((tok) => tok.norm), normalized);
        });
    }

    it('records offsets and whitespace', () => {
        const doc = tokenizer.tokenize('Take 50mg now');
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.idx), [0, 5, 7, 10]);
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.whitespace), [' ', '', ' ', '']);
        assert.strictEqual(doc.tokens.map((tok) => tok.text + tok.whitespace).join(''), doc.text);
    });

    it('keeps the input text and offsets unchanged', () => {
        const input = 'Patient from Besançon, café daily';
        const doc = tokenizer.tokenize(input);
        assert.strictEqual(doc.text, input);
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.idx), [0, 8, 13, 21, 23, 28]);
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.text), ['Patient', 'from', 'Besançon', ',', 'café', 'daily']);
    });

    it('composes the normalized form only', () => {
        const decomposed = 'cafe' + String.fromCharCode(0x301);
        const doc = tokenizer.tokenize(decomposed + ' ok');
        assert.strictEqual(doc.text, decomposed + ' ok');
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.idx), [0, 6]);
        assert.strictEqual(doc.tokens[0].text, decomposed);
        assert.strictEqual(doc.tokens[0].norm, 'caf' + String.fromCharCode(0xe9));
    });

    it('treats line and paragraph separators as whitespace', () => {
        const input = 'one' + String.fromCharCode(0x2028) + 'two' + String.fromCharCode(0x2029) + 'three';
        const doc = tokenizer.tokenize(input);
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.text), ['one', 'two', 'three']);
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.whitespace),
            [String.fromCharCode(0x2028), String.fromCharCode(0x2029), '']);
    });

    it('keeps line breaks in the whitespace', () => {
        const doc = tokenizer.tokenize('one\ntwo ');
        assert.deepStrictEqual(doc.tokens.map((tok) => tok.whitespace), ['\n', ' ']);
    });

    it('returns a single sentence without entities', () => {
        const doc = tokenizer.tokenize('First. Second.');
        assert.deepStrictEqual(doc.sentences, [{ index: 0, start: 0, end: 4 }]);
        assert.deepStrictEqual(doc.ents, []);
    });

    it('returns an empty document for blank input', () => {
        const doc = tokenizer.tokenize('  ');
        assert.strictEqual(doc.length, 0);
        assert.deepStrictEqual(doc.sentences, []);
    });
});
