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

import { ConfigurationError } from '../../lib/errors';
import GenericMatcher from '../../lib/generic/generic';
import Pipeline, { getFactoryNames } from '../../lib/pipeline';
import Normalizer from '../../lib/pipes/normalizer';
import Sentencizer from '../../lib/pipes/sentencizer';

function isError(code : string) {
    return (e : unknown) => e instanceof ConfigurationError && e.code === code;
}

describe('Pipeline', () => {
    it('knows the stage factories', () => {
        assert.deepStrictEqual(getFactoryNames(), ['sentencizer', 'normalizer', 'matcher']);
    });

    it('runs the stages in order', () => {
        const pipeline = new Pipeline();
        pipeline.addPipe('normalizer');
        const matcher = pipeline.addPipe('matcher', 'drinks', { terms: { DRINK: ['cafe', 'Thé'] }, attr: 'NORM' });

        assert.deepStrictEqual(pipeline.pipeNames, ['normalizer', 'drinks']);
        assert(matcher instanceof GenericMatcher);
        assert.strictEqual(pipeline.getPipe('drinks'), matcher);
        assert.strictEqual(pipeline.getPipe('missing'), undefined);
        assert.deepStrictEqual(matcher.diagnostics, []);

        const doc = pipeline.process('I like Café au lait, or the');
        assert.deepStrictEqual(doc.ents.map((ent) => [ent.label, ent.start, ent.end]), [
            ['DRINK', 2, 3],
            ['DRINK', 7, 8],
        ]);
    });

    it('tells matchers which stages come before them', () => {
        const pipeline = new Pipeline();
        const early = pipeline.addPipe('matcher', 'early', { attr: 'NORM' });
        pipeline.addPipe('normalizer');
        const late = pipeline.addPipe('matcher', 'late', { attr: 'NORM' });

        assert(early instanceof GenericMatcher);
        assert(late instanceof GenericMatcher);
        assert.deepStrictEqual(early.diagnostics.map((d) => d.code), ['missing-normalizer']);
        assert.deepStrictEqual(late.diagnostics, []);
    });

    it('lets later matchers build on earlier entities', () => {
        const pipeline = new Pipeline();
        pipeline.addPipe('sentencizer');
        pipeline.addPipe('matcher', 'drugs', { terms: { DRUG: 'aspirin' } });
        pipeline.addPipe('matcher', 'doses', { regex: { DOSE: '\\d+mg' }, on_ents_only: true });

        const doc = pipeline.process('Take aspirin 50mg. Skip 20mg.');
        assert.deepStrictEqual(doc.sentences.map((s) => [s.start, s.end]), [[0, 5], [5, 9]]);
        assert.deepStrictEqual(doc.ents.map((ent) => [ent.label, ent.start, ent.end]), [['DOSE', 2, 4]]);
    });

    it('rejects unknown factories and duplicate names', () => {
        const pipeline = new Pipeline();
        pipeline.addPipe('sentencizer');
        assert.throws(() => pipeline.addPipe('lemmatizer'), isError('unknown-factory'));
        assert.throws(() => pipeline.addPipe('sentencizer'), isError('duplicate-stage'));
        assert.throws(() => pipeline.addPipe('matcher', 'bad', { regex: { BAD: '(' } }), isError('invalid-regex'));
        assert.deepStrictEqual(pipeline.pipeNames, ['sentencizer']);
    });
});

describe('Sentencizer', () => {
    const SENTENCE_TEST_CASES : Array<[string, Array<[number, number]>]> = [
        ['Take aspirin. Rest now!', [[0, 3], [3, 6]]],
        ['Wait... ok', [[0, 4], [4, 5]]],
        ['one\ntwo', [[0, 1], [1, 2]]],
        ['no punctuation here', [[0, 3]]],
    ];

    for (const [input, expected] of SENTENCE_TEST_CASES) {
        it(`splits "${input}"`, () => {
            const pipeline = new Pipeline();
            pipeline.addPipe('sentencizer');
            assert.deepStrictEqual(pipeline.process(input).sentences.map((s) => [s.start, s.end]), expected);
        });
    }

    it('can ignore line breaks', () => {
        const pipeline = new Pipeline();
        pipeline.addPipe('sentencizer', 'sentencizer', { newlines: false });
        assert.deepStrictEqual(pipeline.process('one\ntwo').sentences.length, 1);
    });

    it('reads its configuration', () => {
        const sentencizer = Sentencizer.fromConfig('split', { punct_chars: [';'] });
        assert.strictEqual(sentencizer.name, 'split');
        assert.deepStrictEqual(sentencizer.punctChars, [';']);
        assert.strictEqual(sentencizer.newlines, true);
        assert.throws(() => Sentencizer.fromConfig('split', { punct_chars: ';' }), isError('invalid-option'));
        assert.throws(() => Sentencizer.fromConfig('split', { language: 'en' }), isError('unknown-option'));
    });
});

describe('Normalizer', () => {
    it('removes accents and typographic quotes', () => {
        const normalizer = new Normalizer();
        assert.strictEqual(normalizer.normalize('Café'), 'Cafe');
        assert.strictEqual(normalizer.normalize('’hi’ “there”'), '\'hi\' "there"');
    });

    it('can keep accents and quotes', () => {
        const normalizer = new Normalizer('normalizer', { accents: false, quotes: false });
        assert.strictEqual(normalizer.normalize('’hi’'), '’hi’');
    });

    it('rewrites token norms', () => {
        const pipeline = new Pipeline();
        pipeline.addPipe('normalizer');
        assert.deepStrictEqual(pipeline.process('Crème BRÛLÉE').tokens.map((tok) => tok.norm), ['creme', 'brulee']);
    });

    it('starts from the raw text without lowercasing', () => {
        const pipeline = new Pipeline();
        pipeline.addPipe('normalizer', 'normalizer', { lowercase: false });
        assert.deepStrictEqual(pipeline.process('Crème BRÛLÉE').tokens.map((tok) => tok.norm), ['Creme', 'BRULEE']);
    });

    it('rejects unknown options', () => {
        assert.throws(() => Normalizer.fromConfig('normalizer', { stem: true }), isError('unknown-option'));
    });
});
