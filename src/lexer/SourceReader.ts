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

/**
 * Character source that can be read one character at a time and rewound,
 * so that every pass can scan the same input from the beginning.
 */
export class SourceReader {
    private data: string;
    private pos = 0;

    public constructor(data: string) {
        this.data = data;
    }

    public peek(): string | undefined {
        if (this.pos >= this.data.length) {
            return undefined;
        }
        return this.data[this.pos];
    }

    public read(): string | undefined {
        const chr = this.peek();
        if (chr !== undefined) {
            this.pos++;
        }
        return chr;
    }

    public seek(offset: number) {
        if (offset < 0 || offset > this.data.length) {
            throw RangeError(`Invalid source offset ${offset}`);
        }
        this.pos = offset;
    }
}
