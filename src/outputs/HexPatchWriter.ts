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

import { WordWidth } from "../utils/Nano.js";
import { binaryToHex, numToBinary } from "../utils/Strings.js";
import type { SramLayout } from "./SramLayout.js";
import type { WordWriter } from "./WordWriter.js";

/**
 * Packs words into the hex lines of a memory region. A line is filled from
 * its highest slot downwards, so the first word ends up in the lowest bits.
 */
export class HexPatchWriter implements WordWriter {
    private layout: SramLayout;
    private out: (line: string, lineIdx: number) => void;
    private slots: number[];
    private free: number;
    private lineIdx = 0;

    public constructor(layout: SramLayout, out: (line: string, lineIdx: number) => void) {
        this.layout = layout;
        this.out = out;
        this.slots = new Array<number>(layout.wordsPerLine).fill(0);
        this.free = layout.wordsPerLine;
    }

    public writeWord(word: number) {
        if (this.lineIdx >= this.layout.lineCount) {
            throw Error("Memory region is full");
        }

        this.free--;
        this.slots[this.free] = word;
        if (this.free == 0) {
            this.writeLine();
        }
    }

    // fills the rest of the region with zero words
    public pad() {
        while (this.lineIdx < this.layout.lineCount) {
            this.writeWord(0);
        }
    }

    public getLinesWritten(): number {
        return this.lineIdx;
    }

    private writeLine() {
        const bits = this.slots.map(w => numToBinary(w, WordWidth)).join("");
        const line = this.layout.prefix(this.lineIdx) + binaryToHex(bits) + this.layout.suffix(this.lineIdx);
        this.out(line, this.lineIdx);

        this.lineIdx++;
        this.slots.fill(0);
        this.free = this.layout.wordsPerLine;
    }
}
