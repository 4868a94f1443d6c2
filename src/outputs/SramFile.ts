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

import { readFileSync, writeFileSync } from "fs";
import { cursorAt } from "../lexer/Cursor.js";
import { CodeError } from "../utils/CodeError.js";
import { replaceNonPrints } from "../utils/Strings.js";
import { HexPatchWriter } from "./HexPatchWriter.js";
import type { SramLayout } from "./SramLayout.js";
import type { Destination } from "./WordWriter.js";

export class DestinationFormatError extends CodeError {
    public constructor(msg: string, inputName: string, content: string, offset: number) {
        super(msg, cursorAt(inputName, content, offset));
        this.name = DestinationFormatError.name;
    }
}

const HexRegex = /[0-9A-Fa-f]*/y;

/**
 * Memory file whose region gets replaced by the program. The file is only
 * read in prepare() and written once in finish().
 */
export class SramFile implements Destination {
    public readonly capacity: number;
    private path: string;
    private layout: SramLayout;
    private packer: HexPatchWriter;
    private lines: string[] = [];
    private head?: string;

    public constructor(path: string, layout: SramLayout) {
        this.path = path;
        this.layout = layout;
        this.capacity = layout.capacity;
        this.packer = new HexPatchWriter(layout, line => this.lines.push(line));
    }

    public prepare() {
        // latin1 maps bytes to chars 1:1, so offsets stay byte offsets
        const content = readFileSync(this.path).toString("latin1");
        this.head = verifySramRegion(this.path, content, this.layout);
    }

    public writeWord(word: number) {
        this.packer.writeWord(word);
    }

    public finish() {
        if (this.head === undefined) {
            throw Error("Memory file was not prepared");
        }

        this.packer.pad();
        const content = this.head + this.lines.join("") + this.layout.footer;
        writeFileSync(this.path, Buffer.from(content, "latin1"));
    }
}

/**
 * Checks that content has the layout's memory lines at the layout's offset.
 *
 * @returns the content before the region
 */
export function verifySramRegion(inputName: string, content: string, layout: SramLayout): string {
    if (content.length < layout.offset) {
        throw new DestinationFormatError("File ends before the memory region", inputName, content, content.length);
    }

    let pos = layout.offset;
    for (let i = 0; i < layout.lineCount; i++) {
        const prefix = layout.prefix(i);
        if (!content.startsWith(prefix, pos)) {
            throw new DestinationFormatError(`Memory line ${i} must start with '${replaceNonPrints(prefix)}'`, inputName, content, pos);
        }
        pos += prefix.length;

        HexRegex.lastIndex = pos;
        const digits = HexRegex.exec(content)?.[0].length ?? 0;
        const suffix = layout.suffix(i);
        const suffixOk = content.startsWith(suffix, pos + layout.digitsPerLine);
        if (digits < layout.digitsPerLine || (digits > layout.digitsPerLine && !suffixOk)) {
            throw new DestinationFormatError(`Memory line ${i} must have ${layout.digitsPerLine} hex digits, found ${digits}`, inputName, content, pos);
        }
        pos += layout.digitsPerLine;

        if (!suffixOk) {
            throw new DestinationFormatError(`Memory line ${i} must end with '${replaceNonPrints(suffix)}'`, inputName, content, pos);
        }
        pos += suffix.length;
    }

    return content.substring(0, layout.offset);
}
