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

import type { Cursor } from "../lexer/Cursor.js";
import { TokenType } from "../lexer/Token.js";
import type { FieldToken, LabelReferenceToken } from "../lexer/Token.js";
import type { WordWriter } from "../outputs/WordWriter.js";
import type { Worker } from "../parser/Worker.js";
import type { CodeError } from "../utils/CodeError.js";
import { OpcodeWidth, RegisterWidth, WordWidth, fitsWidth } from "../utils/Nano.js";
import { UndeclaredLabelError, ValueRangeError } from "./AssemblerError.js";
import { BitWordBuffer } from "./BitWordBuffer.js";
import type { LabelTable } from "./LabelCollector.js";

/**
 * Code generating pass: turns tokens into bit fields and writes the resulting
 * words. Without a writer the words are only counted.
 */
export class Translator implements Worker {
    private labels: LabelTable;
    private writer?: WordWriter;
    private buffer: BitWordBuffer;
    private errors: CodeError[] = [];
    private wordStart?: Cursor;
    private wordCount = 0;

    public constructor(labels: LabelTable, writer?: WordWriter) {
        this.labels = labels;
        this.writer = writer;
        this.buffer = new BitWordBuffer(WordWidth, word => this.outputWord(word));
    }

    public write(tok: FieldToken) {
        switch (tok.type) {
            case TokenType.RegisterInstruction:
            case TokenType.ImmediateInstruction:
                this.writeField(tok.cursor, tok.opcode, OpcodeWidth);
                break;
            case TokenType.Register:
                this.writeField(tok.cursor, tok.code, RegisterWidth);
                break;
            case TokenType.Literal:
                this.writeField(tok.cursor, tok.value, WordWidth);
                break;
        }
    }

    public writeDereferencedLabel(tok: LabelReferenceToken) {
        const addr = this.labels.get(tok.name);
        if (addr === undefined) {
            this.errors.push(new UndeclaredLabelError(tok));
            return;
        }

        if (!fitsWidth(addr, WordWidth)) {
            throw new ValueRangeError(`Address ${addr} of label '${tok.name}' does not fit into ${WordWidth} bits`, tok.cursor);
        }
        this.writeField(tok.cursor, addr, WordWidth);
    }

    public getErrors(): readonly CodeError[] {
        return this.errors;
    }

    public getWordCount(): number {
        return this.wordCount;
    }

    private writeField(cursor: Cursor, value: number, width: number) {
        if (this.buffer.isEmpty()) {
            this.wordStart = cursor;
        }
        this.buffer.writeBits(value, width);
    }

    private outputWord(word: number) {
        this.wordCount++;
        if (this.writer && this.wordStart) {
            this.writer.writeWord(word, this.wordStart);
        }
    }
}
