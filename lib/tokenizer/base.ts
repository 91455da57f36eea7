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

import assert from 'assert';
import Lexer from 'flex-js';

import { WS, type RawToken, makeToken } from './helpers';
import Doc, { type TokenData } from '../doc';

// This interface exists so that we don't depend on Lexer in the public
// interface, so the generated .d.ts will not try to load flex-js and die
// miserably
interface LexerLike<TokenType> {
    index : number;
    text : string;
    state : string;

    addRule(expr : RegExp, cb ?: (self : LexerLike<TokenType>) => TokenType) : void;
}

/**
 * A rule-based, language-agnostic tokenizer.
 *
 * Every token carries its raw text, a normalized form (lowercased words,
 * canonical numbers, lowercased URLs and email addresses) and the whitespace
 * that follows it in the input, so the input can be reconstructed exactly
 * from the tokens.
 */
export default class Tokenizer {
    private _realLexer : Lexer<RawToken>;
    protected _lexer : LexerLike<RawToken>;

    constructor() {
        this._realLexer = new Lexer();
        this._lexer = this._realLexer;

        this._realLexer.setIgnoreCase(true);

        // this is a classic longest-match-first (greedy) lexical analyzer
        // hence, we don't need to delimit tokens, add trailing context or assertions
        // if some prefix of a word matches a shorter rule, we'll continue
        // scanning until the end of the word

        this._initBase();
        this._initAbbrv();
        this._initURLs();
        this._initEmailAddress();
        this._initNumbers();

        this._initCatchAll();
    }

    protected _addDefinition(name : string, expansion : RegExp) {
        // HACK: the "addDefinition" function of Lexer does not recursively expand definitions, so we need to do that ourselves
        let source = expansion.source;
        for (const name in this._realLexer.definitions) {
            const replace = new RegExp('{' + name + '}', 'ig');
            source = source.replace(replace, '(?:' + this._realLexer.definitions[name] + ')');
        }
        this._realLexer.addDefinition(name, new RegExp(source));
    }

    protected _initBase() {
        this._addDefinition('WS', WS);

        // discard whitespace (default action is discard)
        // whitespace is recovered from the token offsets in tokenize()
        this._lexer.addRule(WS);

        // letters (includes combining accents and letters commonly used in Western European languages)
        this._addDefinition('LETTER', /[_a-z\u00C0-\u00D6\u00D8-\u00F6\u00F8-\u01BA\u01BB\u01BC-\u01BF\u01C0-\u01C3\u01C4-\u0293\u0294\u0295\u02AF\u02EE\u0300-\u036f\u0600-\u06ff\uFB50-\uFDFF\u00DF\u00E4\u00FC\u00C4\u00D6\u00DC]/);

        // words
        // note that we do not split hyphens ever
        // hyphens are considered part of a word if at the beginning of a word or in-between two letters
        // numbers are considered part of a word if preceded by a letter
        this._addDefinition('WORD', /(?:-?{LETTER}[0-9]*)+/);
        // identifiers (tokens with at least an ASCII letter, but also - _ or a number)
        this._addDefinition('IDENT', /[a-z][a-z0-9_-]+|[0-9_-]+[a-z][a-z0-9_-]+/);
    }

    protected _initAbbrv() {
        // words with inner apostrophes stay together ("o'clock", "aujourd'hui")
        this._addDefinition('APWORD', /{LETTER}+(?:['’]{LETTER}+)+/);

        // common abbreviations keep their period, so they do not end a sentence
        this._lexer.addRule(/(?:dr|mr|mrs|ms|st|vs|etc|e\.g|i\.e)\./, (lexer) => makeToken(lexer.text));
    }

    protected _initURLs() {
        // a long url is http:// and similar, followed by anything up to ">", "," or whitespace
        this._lexer.addRule(/(?:https?|ftps?|file):\/\/[^ \t\n\r\v,>]+/,
            (lexer) => makeToken(lexer.text, lexer.text));

        // a short url is www. followed by one or more . idents
        this._lexer.addRule(/www\.{IDENT}(?:\.{IDENT})+/,
            (lexer) => makeToken(lexer.text, 'http://' + lexer.text.toLowerCase()));
    }

    protected _initEmailAddress() {
        this._lexer.addRule(/(?:mailto:)?(?:{LETTER}|[0-9.+_-])+@{IDENT}(\.{IDENT})+/, (lexer) => {
            let email = lexer.text.toLowerCase();
            if (email.startsWith('mailto:'))
                email = email.substring('mailto:'.length);
            return makeToken(lexer.text, email);
        });
    }

    protected _normalizeDecimalNumber(text : string) : string {
        // digits are kept as written, so long codes do not lose precision
        const [integerPart, fractionPart = ''] = text.replace(/,/g, '').split('.');
        let sign = '';
        let integer = integerPart;
        if (integer.startsWith('-') || integer.startsWith('+')) {
            sign = integer.startsWith('-') ? '-' : '';
            integer = integer.substring(1);
        }
        integer = integer.replace(/^0+/, '') || '0';
        const fraction = fractionPart.replace(/0+$/, '');
        if (integer === '0' && !fraction)
            return '0';
        return sign + integer + (fraction ? '.' + fraction : '');
    }

    protected _initNumbers() {
        // numbers in digit without any separator
        this._addDefinition('DIGITS', /[0-9]+/);
        this._addDefinition('DECIMAL_NUMBER', /\.{DIGITS}|{DIGITS}(?:\.{DIGITS})?/);

        this._lexer.addRule(/[+-]?{DECIMAL_NUMBER}/,
            (lexer) => makeToken(lexer.text, this._normalizeDecimalNumber(lexer.text)));
    }

    protected _initCatchAll() {
        // the simplest rule: matching words
        // this must be last so we match special words first
        this._lexer.addRule(/{APWORD}|{WORD}/, (lexer) => makeToken(lexer.text,
            lexer.text.toLowerCase().replace(/’/g, "'")));

        // old-school dashes
        this._lexer.addRule(/--/, (lexer) => makeToken(lexer.text));

        // collapse sequences of underscores
        this._lexer.addRule(/_+/, (lexer) => makeToken(lexer.text));

        // lone right single quotation marks
        this._lexer.addRule(/’/, (lexer) => makeToken(lexer.text, "'"));

        // catch-all rule: punctuation and other symbols
        this._lexer.addRule(/./, (lexer) => makeToken(lexer.text));
    }

    /**
     * Split `text` into a new document.
     *
     * The document text and the token offsets refer to `text` unchanged;
     * compatibility characters are folded (NFKC) in the normalized forms only.
     */
    tokenize(text : string) : Doc {
        this._realLexer.setSource(text);

        const tokens : TokenData[] = [];
        let cursor = 0;
        let token : RawToken|(typeof Lexer.EOF);
        while ((token = this._realLexer.lex()) !== Lexer.EOF) {
            // everything the lexer discards is whitespace, so the raw text
            // of the next token is the next non-whitespace run
            const idx = text.indexOf(token.raw, cursor);
            assert(idx >= 0);
            if (tokens.length > 0)
                tokens[tokens.length-1].whitespace = text.substring(cursor, idx);
            tokens.push({ idx, text: token.raw, norm: token.normalized.normalize('NFKC'), whitespace: '' });
            cursor = idx + token.raw.length;
        }
        if (tokens.length > 0)
            tokens[tokens.length-1].whitespace = text.substring(cursor);

        return new Doc(text, tokens);
    }
}
