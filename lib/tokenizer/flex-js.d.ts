// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-

// flex-js ships no type declarations; this covers the part of its API the tokenizer uses
declare module 'flex-js' {
    export default class Lexer<TokenType> {
        static EOF : 0;

        // the source of each definition
        definitions : Record<string, string>;

        index : number;
        text : string;
        state : string;

        setIgnoreCase(ignoreCase : boolean) : void;

        addDefinition(name : string, expr : RegExp) : void;
        addRule(expr : RegExp, cb ?: (self : Lexer<TokenType>) => TokenType) : void;

        setSource(source : string) : void;
        lex() : TokenType|0;
        reset() : void;
    }
}
