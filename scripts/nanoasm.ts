#!/usr/bin/env node
/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import { command, flag, number, option, optional, positional, run, string } from "cmd-ts";
import { existsSync, readFileSync, statSync } from "fs";
import { basename } from "path";
import { NanoAsm } from "../src/NanoAsm.js";
import type { AssemblerOutput } from "../src/assembler/Assembler.js";
import { DefaultSramLayout } from "../src/outputs/SramLayout.js";
import { formatCodeError } from "../src/utils/CodeError.js";

const cmd = command({
    name: "nanoasm",
    description: "Assembler for the 9 bit NanoProcessor",
    args: {
        encoding: option({
            long: "encoding",
            short: "e",
            description: "Encoding of the source file",
            type: string,
            defaultValue: () => "utf-8",
            defaultValueIsSerializable: true,
        }),
        output: option({
            long: "output",
            short: "o",
            description: "Overwrite the initial memory content of the given SRAM module file",
            type: optional(string),
        }),
        offset: option({
            long: "offset",
            description: "Byte offset of the memory lines in the SRAM module file",
            type: optional(number),
        }),
        capacity: option({
            long: "capacity",
            description: "Maximum number of words when writing to stdout",
            type: optional(number),
        }),
        labels: flag({
            long: "labels",
            short: "l",
            description: "Print the address of every label",
        }),
        source: positional({
            description: "Source file in NanoProcessor assembly language",
            displayName: "source",
            type: string,
        }),
    },

    handler: (args) => {
        if (!existsSync(args.source) || !statSync(args.source).isFile()) {
            console.error(`File '${args.source}' does not exist.`);
            process.exit(-1);
        }

        if (args.output && (!existsSync(args.output) || !statSync(args.output).isFile())) {
            console.error(`File '${args.output}' does not exist.`);
            process.exit(-1);
        }

        if (!Buffer.isEncoding(args.encoding)) {
            console.error(`Source encoding '${args.encoding}' is not supported.`);
            process.exit(-2);
        }

        const inputName = basename(args.source);
        const src = readFileSync(args.source, args.encoding).replace(/^\uFEFF/, "");
        const nanoAsm = new NanoAsm(src, { inputName, capacity: args.capacity });

        let output: AssemblerOutput;
        if (args.output) {
            const layout = args.offset === undefined ? DefaultSramLayout : { ...DefaultSramLayout, offset: args.offset };
            output = nanoAsm.patch(args.output, layout);
        } else {
            output = nanoAsm.dump(line => console.log(line));
        }

        output.warnings.forEach(w => console.warn(`${inputName}: warning: ${w}`));
        if (output.errors.length > 0) {
            output.errors.forEach(e => console.error(formatCodeError(e)));
            process.exit(-3);
        }

        if (args.labels) {
            [...output.labels]
                .sort(([, a], [, b]) => a - b)
                .forEach(([name, addr]) => console.log(`${addr.toString().padStart(3, "0")} ${name}`));
        }

        if (args.output) {
            console.log(`Wrote ${output.wordCount} words to ${args.output}`);
        }

        process.exit(0);
    }
});

void run(cmd, process.argv.slice(2));
