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

import { Lexer } from "../lexer/Lexer.js";
import { SourceReader } from "../lexer/SourceReader.js";
import { WordCounter } from "../outputs/WordCounter.js";
import type { Destination } from "../outputs/WordWriter.js";
import { Parser } from "../parser/Parser.js";
import type { Worker } from "../parser/Worker.js";
import { CodeError } from "../utils/CodeError.js";
import { CapacityError } from "./AssemblerError.js";
import { LabelCollector } from "./LabelCollector.js";
import type { LabelTable } from "./LabelCollector.js";
import { Translator } from "./Translator.js";

export interface AssemblerOptions {
    // word limit, also applied to destinations without a capacity of their own
    capacity?: number;
}

export interface AssemblerOutput {
    errors: readonly CodeError[];
    warnings: readonly string[];
    labels: LabelTable;
    wordCount: number;
}

/**
 * Runs the passes over the source. Every pass scans the input from the start,
 * the destination is only touched once all checks have passed.
 */
export class Assembler {
    private opts: AssemblerOptions;
    private inputName: string;
    private source: SourceReader;

    public constructor(options: AssemblerOptions, inputName: string, input: string) {
        this.opts = options;
        this.inputName = inputName;
        this.source = new SourceReader(input);
    }

    public assemble(dest: Destination): AssemblerOutput {
        let labels: LabelTable = new Map();
        let warnings: readonly string[] = [];

        try {
            // pass 1: assign addresses to labels, stops at the first syntax error
            const collector = new LabelCollector();
            this.doPass(collector);
            labels = collector.finish();
            warnings = collector.getWarnings();

            // pass 2: resolve every label reference without output
            const resolver = new Translator(labels);
            this.doPass(resolver);
            if (resolver.getErrors().length > 0) {
                return { errors: resolver.getErrors(), warnings, labels, wordCount: 0 };
            }

            // pass 3: make sure the program fits
            const capacity = this.getCapacity(dest);
            if (capacity !== undefined) {
                const counter = new WordCounter(capacity);
                this.doPass(new Translator(labels, counter));
                const excess = counter.getFirstExcess();
                if (excess) {
                    throw new CapacityError(counter.getCount(), capacity, excess);
                }
            }

            // pass 4: generate code
            dest.prepare?.();
            const translator = new Translator(labels, dest);
            this.doPass(translator);
            dest.finish();

            return { errors: [], warnings, labels, wordCount: translator.getWordCount() };
        } catch (e) {
            if (e instanceof CodeError) {
                return { errors: [e], warnings, labels, wordCount: 0 };
            }
            throw e;
        }
    }

    private getCapacity(dest: Destination): number | undefined {
        if (this.opts.capacity === undefined) {
            return dest.capacity;
        } else if (dest.capacity === undefined) {
            return this.opts.capacity;
        }
        return Math.min(this.opts.capacity, dest.capacity);
    }

    private doPass(worker: Worker) {
        this.source.seek(0);
        const lexer = new Lexer(this.inputName, this.source);
        const parser = new Parser(lexer, worker);
        parser.parseProgram();
    }
}
