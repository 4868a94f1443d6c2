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

import { fitsWidth } from "../utils/Nano.js";

/**
 * Collects bit fields MSB first into words of a fixed width and hands every
 * complete word to the sink.
 */
export class BitWordBuffer {
    private wordWidth: number;
    private sink: (word: number) => void;
    private word = 0;
    private fill = 0;

    public constructor(wordWidth: number, sink: (word: number) => void) {
        this.wordWidth = wordWidth;
        this.sink = sink;
    }

    public writeBits(value: number, width: number) {
        if (!fitsWidth(value, width)) {
            throw Error(`Value ${value} does not fit into ${width} bits`);
        }

        for (let bit = width - 1; bit >= 0; bit--) {
            this.word = (this.word << 1) | ((value >> bit) & 1);
            this.fill++;
            if (this.fill == this.wordWidth) {
                this.sink(this.word);
                this.word = 0;
                this.fill = 0;
            }
        }
    }

    public isEmpty(): boolean {
        return this.fill == 0;
    }

    public getPendingBits(): number {
        return this.fill;
    }
}
