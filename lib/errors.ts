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
 * An error in the configuration of a pipeline or one of its stages.
 *
 * All configuration errors are raised at construction time, before any
 * document is processed.
 */
export class ConfigurationError extends Error {
    code : string;

    constructor(code : string, message : string) {
        super(message);
        this.name = 'ConfigurationError';
        this.code = code;
    }
}

export interface Diagnostic {
    level : 'warning';
    code : string;
    message : string;
}

export function warning(code : string, message : string) : Diagnostic {
    return { level: 'warning', code, message };
}
