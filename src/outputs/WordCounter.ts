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
import type { WordWriter } from "./WordWriter.js";

/**
 * Discards the words and only counts them, remembering where the first word
 * beyond the capacity came from.
 */
export class WordCounter implements WordWriter {
    private capacity?: number;
    private count = 0;
    private firstExcess?: Cursor;

    public constructor(capacity?: number) {
        this.capacity = capacity;
    }

    public writeWord(_word: number, origin: Cursor) {
        this.count++;
        if (this.capacity !== undefined && this.count > this.capacity && !this.firstExcess) {
            this.firstExcess = origin;
        }
    }

    public getCount(): number {
        return this.count;
    }

    public getFirstExcess(): Cursor | undefined {
        return this.firstExcess;
    }
}
