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

import { Assembler } from "./assembler/Assembler.js";
import type { AssemblerOptions, AssemblerOutput } from "./assembler/Assembler.js";
import { BinaryDumpWriter } from "./outputs/BinaryDumpWriter.js";
import { SramFile } from "./outputs/SramFile.js";
import { DefaultSramLayout } from "./outputs/SramLayout.js";
import type { SramLayout } from "./outputs/SramLayout.js";
import type { Destination } from "./outputs/WordWriter.js";

export interface NanoAsmOptions extends AssemblerOptions {
    // name of the source in messages
    inputName?: string;
}

export class NanoAsm {
    private asm: Assembler;

    public constructor(input: string, opts: NanoAsmOptions = {}) {
        this.asm = new Assembler(opts, opts.inputName ?? "input", input);
    }

    public assemble(dest: Destination): AssemblerOutput {
        return this.asm.assemble(dest);
    }

    // writes every word as a line of binary digits
    public dump(out: (line: string) => void): AssemblerOutput {
        return this.asm.assemble(new BinaryDumpWriter(out));
    }

    // replaces the memory region of an existing SRAM module file
    public patch(path: string, layout: SramLayout = DefaultSramLayout): AssemblerOutput {
        return this.asm.assemble(new SramFile(path, layout));
    }
}
