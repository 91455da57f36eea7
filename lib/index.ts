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

import Doc from './doc';
import Span from './span';
import Pipeline from './pipeline';
import Tokenizer from './tokenizer/base';
import GenericMatcher from './generic/generic';
import filterSpans from './generic/filter';
import PhraseMatcher from './matchers/phrase';
import FuzzyMatcher from './matchers/fuzzy';
import RegexMatcher from './matchers/regex';
import Normalizer from './pipes/normalizer';
import Sentencizer from './pipes/sentencizer';
import StringStore from './utils/string-store';
import similarityRatio from './utils/edit-distance';

export {
    // documents
    Doc,
    Span,
    Tokenizer,
    Pipeline,

    // pipeline stages
    GenericMatcher,
    Normalizer,
    Sentencizer,

    // matching engines
    PhraseMatcher,
    FuzzyMatcher,
    RegexMatcher,
    filterSpans,

    // utilities
    StringStore,
    similarityRatio,
};

export type { Attribute, Document, Sentence, SpanLike, Token, AlignmentMode } from './document';
export type { Match, MatchProducer, MatchSource } from './matchers/types';
export type { FuzzyOptions } from './matchers/fuzzy';
export type { PipelineComponent } from './pipeline';
export type { MatcherConfig, RawMatcherConfig, RawFuzzyOptions } from './generic/config';
export type { AttributeMap, AttributeSpec } from './generic/attributes';
export type { CompiledMatchState, PatternTokenizer } from './generic/patterns';
export { ConfigurationError } from './errors';
export type { Diagnostic } from './errors';
export { parseMatcherConfig, DEFAULT_FUZZY_OPTIONS } from './generic/config';
export { resolveAttributes, TERM_ATTR, DEFAULT_ATTR, NORMALIZER_STAGE } from './generic/attributes';
export { compilePatterns } from './generic/patterns';
export { loadPipelineConfig, parsePipelineConfig, buildPipeline } from './config-file';
export type { PipelineConfig, StageConfig } from './config-file';
