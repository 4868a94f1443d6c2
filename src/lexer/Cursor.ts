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

export interface Cursor {
    inputName: string;
    lineIdx: number;
    colIdx: number;
}

export function formatCursor(cursor: Cursor): string {
    return `${cursor.lineIdx + 1}:${cursor.colIdx + 1}`;
}

// cursor of a character offset inside a text
export function cursorAt(inputName: string, text: string, offset: number): Cursor {
    let lineIdx = 0;
    let lineStart = 0;
    for (let i = 0; i < offset && i < text.length; i++) {
        if (text[i] == "\n") {
            lineIdx++;
            lineStart = i + 1;
        }
    }
    return { inputName, lineIdx, colIdx: offset - lineStart };
}
