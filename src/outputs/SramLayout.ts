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

import { MemSize, WordWidth } from "../utils/Nano.js";

export interface SramLayoutOptions {
    // byte offset of the first memory line in the file
    offset: number;
    lineCount: number;
    wordsPerLine: number;
    prefix: (lineIdx: number) => string;
    suffix: (lineIdx: number) => string;
    // replaces everything after the last memory line
    footer: string;
}

export interface SramLayout extends SramLayoutOptions {
    readonly digitsPerLine: number;
    readonly capacity: number;
}

export function createSramLayout(opts: SramLayoutOptions): SramLayout {
    const bitsPerLine = opts.wordsPerLine * WordWidth;
    if (bitsPerLine % 4 != 0) {
        throw Error(`${opts.wordsPerLine} words of ${WordWidth} bits can't be written as hex digits`);
    }
    if (opts.lineCount < 1 || opts.wordsPerLine < 1 || opts.offset < 0) {
        throw Error("Invalid memory region layout");
    }

    return {
        ...opts,
        digitsPerLine: bitsPerLine / 4,
        capacity: opts.lineCount * opts.wordsPerLine,
    };
}

const InitWordsPerLine = 32;
const InitLines = MemSize / InitWordsPerLine;
const InitBits = InitWordsPerLine * WordWidth;

export const DefaultSramHeader = [
    "module sram (",
    "    input wire clk,",
    "    input wire we,",
    `    input wire [${WordWidth - 1}:0] addr,`,
    `    input wire [${WordWidth - 1}:0] din,`,
    `    output reg [${WordWidth - 1}:0] dout`,
    ");",
    `    reg [${WordWidth - 1}:0] mem [0:${MemSize - 1}];`,
    `    reg [${InitBits - 1}:0] init [0:${InitLines - 1}];`,
    "    integer i;",
    "",
    "    always @(posedge clk) begin",
    "        if (we)",
    "            mem[addr] <= din;",
    "        dout <= mem[addr];",
    "    end",
    "",
    "    initial begin",
    "",
].join("\n");

/**
 * Memory file of the processor: a Verilog SRAM whose initial block holds the
 * memory content as hex lines, address 0 at the lowest bits of line 0.
 */
export const DefaultSramLayout = createSramLayout({
    offset: Buffer.byteLength(DefaultSramHeader, "latin1"),
    lineCount: InitLines,
    wordsPerLine: InitWordsPerLine,
    prefix: idx => `        init[${idx}] = ${InitBits}'h`,
    suffix: () => ";\n",
    footer: [
        `        for (i = 0; i < ${MemSize}; i = i + 1)`,
        `            mem[i] = init[i / ${InitWordsPerLine}][(i % ${InitWordsPerLine}) * ${WordWidth} +: ${WordWidth}];`,
        "    end",
        "endmodule",
        "",
    ].join("\n"),
});

// an empty memory file for the layout, preceded by header
export function renderBlankSram(layout: SramLayout, header: string): string {
    if (Buffer.byteLength(header, "latin1") != layout.offset) {
        throw Error("Header length does not match the layout offset");
    }

    let res = header;
    for (let i = 0; i < layout.lineCount; i++) {
        res += layout.prefix(i) + "0".repeat(layout.digitsPerLine) + layout.suffix(i);
    }
    return res + layout.footer;
}
