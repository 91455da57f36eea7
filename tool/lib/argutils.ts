// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Genie
//
// Copyright 2019-2020 The Board of Trustees of the Leland Stanford Junior University
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

import * as fs from 'fs';
import * as stream from 'stream';
import * as log4js from 'log4js';

export function maybeCreateReadStream(filename : string) : stream.Readable {
    if (filename === '-')
        return process.stdin;
    else
        return fs.createReadStream(filename);
}

export function maybeCreateWriteStream(filename : string|undefined) : stream.Writable {
    if (!filename || filename === '-')
        return process.stdout;
    else
        return fs.createWriteStream(filename);
}

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'off'];

export function configureLogging(level : string) : void {
    // logs go to stderr, so they never mix with the output
    log4js.configure({
        appenders: {
            stderr: { type: 'stderr' },
        },
        categories: {
            default: { appenders: ['stderr'], level },
        },
    });
}

/**
 * The arguments of all sub-commands, as parsed by argparse.
 */
export interface ParsedArgs {
    subcommand : string;
    config : string;
    log_level : string;
    output ?: string;
    input ?: string[];
}
