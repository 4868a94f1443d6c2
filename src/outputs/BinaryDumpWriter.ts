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
import { numToBinary } from "../utils/Strings.js";
import type { Destination } from "./WordWriter.js";

/**
 * Writes every word as a line of '0' and '1', MSB first.
 */
export class BinaryDumpWriter implements Destination {
    private out: (line: string) => void;

    public constructor(out: (line: string) => void) {
        this.out = out;
    }

    public writeWord(word: number) {
        this.out(numToBinary(word, WordWidth));
    }

    public finish() {
        // lines are written as they come
    }
}
