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

import { formatCursor } from "../lexer/Cursor.js";
import type { LabelDeclarationToken } from "../lexer/Token.js";
import type { Worker } from "../parser/Worker.js";

export type LabelTable = ReadonlyMap<string, number>;

/**
 * First pass: binds every declared label to the address of the word that
 * follows it. Redeclaring a label moves it and produces a warning.
 */
export class LabelCollector implements Worker {
    private labels = new Map<string, number>();
    private pending: LabelDeclarationToken[] = [];
    private warnings: string[] = [];
    private clc = 0;

    public addPendingLabel(tok: LabelDeclarationToken) {
        this.pending.push(tok);
    }

    public flushPendingLabels() {
        for (const tok of this.pending) {
            if (this.labels.has(tok.name)) {
                this.warnings.push(`Label '${tok.name}' redeclared at ${formatCursor(tok.cursor)}`);
            }
            this.labels.set(tok.name, this.clc);
        }
        this.pending = [];
        this.clc++;
    }

    // labels still pending at the end of input have no word to stand for
    public finish(): LabelTable {
        for (const tok of this.pending) {
            this.warnings.push(`Label '${tok.name}' at ${formatCursor(tok.cursor)} does not label any word`);
        }
        this.pending = [];
        return new Map(this.labels);
    }

    public getWarnings(): readonly string[] {
        return this.warnings;
    }

    public getWordCount(): number {
        return this.clc;
    }
}
