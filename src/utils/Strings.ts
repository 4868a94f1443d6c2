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

export function replaceNonPrints(s: string): string {
    return s
        .replaceAll("\t", "<TAB>")
        .replaceAll("\r", "<CR>")
        .replaceAll("\n", "<LF>")
        .replaceAll("\v", "<VT>")
        .replaceAll("\b", "<BS>")
        .replaceAll("\x00", "<NUL>")
        .replaceAll("\x07", "<BEL>")
        .replaceAll("\f", "<FF>");
}

export function numToBinary(num: number, width: number): string {
    return num.toString(2).padStart(width, "0");
}

// converts a string of '0' and '1' into uppercase hex, 4 bits per digit
export function binaryToHex(bits: string): string {
    if (bits.length % 4 != 0) {
        throw Error(`Bit count ${bits.length} is not a multiple of 4`);
    }

    let hex = "";
    for (let i = 0; i < bits.length; i += 4) {
        hex += Number.parseInt(bits.substring(i, i + 4), 2).toString(16).toUpperCase();
    }
    return hex;
}
