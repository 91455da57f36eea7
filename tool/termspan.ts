#!/usr/bin/env node
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

import * as argparse from 'argparse';

import { ConfigurationError } from '../lib/errors';
import { LOG_LEVELS, type ParsedArgs, configureLogging } from './lib/argutils';
import * as Annotate from './annotate';
import * as CheckConfig from './check-config';

interface SubCommand {
    initArgparse(parser : argparse.SubParser, parents : argparse.ArgumentParser[]) : void;
    execute(args : ParsedArgs) : Promise<void>;
}

const subcommands : { [key : string] : SubCommand } = {
    'annotate': Annotate,
    'check-config': CheckConfig,
};

const LOG_LEVEL_HELP = 'Minimum level of the messages to log on stderr';

export function makeParser() : argparse.ArgumentParser {
    // options accepted after the sub-command too; SUPPRESS keeps the
    // sub-command from overwriting a value given before it
    const common = new argparse.ArgumentParser({ add_help: false });
    common.add_argument('--log-level', {
        required: false,
        choices: LOG_LEVELS,
        default: argparse.SUPPRESS,
        help: LOG_LEVEL_HELP
    });

    const parser = new argparse.ArgumentParser({
        add_help: true,
        description: "Find terms and patterns in text, and resolve them into non-overlapping labeled spans."
    });
    parser.add_argument('--log-level', {
        required: false,
        choices: LOG_LEVELS,
        default: 'warn',
        help: LOG_LEVEL_HELP
    });

    const subparserOptions = {
        title: 'Available sub-commands',
        dest: 'subcommand',
        required: true
    };
    const subparsers = parser.add_subparsers(subparserOptions);
    for (const subcommand in subcommands)
        subcommands[subcommand].initArgparse(subparsers, [common]);
    return parser;
}

/**
 * Run the sub-command named in `args`.
 *
 * Configuration errors are reported on stderr as a single line, and set
 * the exit code to 1; any other error propagates.
 */
export async function run(args : ParsedArgs) : Promise<void> {
    try {
        await subcommands[args.subcommand].execute(args);
    } catch(e) {
        if (!(e instanceof ConfigurationError))
            throw e;
        console.error(`Invalid configuration: ${e.message}`);
        process.exitCode = 1;
    }
}

async function main() {
    const args : ParsedArgs = makeParser().parse_args();
    configureLogging(args.log_level);
    await run(args);
}

if (require.main === module) {
    process.on('unhandledRejection', (up) => {
        throw up;
    });

    main().catch((e : unknown) => {
        console.error(e instanceof Error ? e.message : String(e));
        process.exit(1);
    });
}
