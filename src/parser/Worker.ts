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

import type { FieldToken, LabelDeclarationToken, LabelReferenceToken } from "../lexer/Token.js";

/**
 * Receives the semantic events of a parse. A pass implements only the
 * events it cares about, missing handlers are skipped by the parser.
 */
export interface Worker {
    // a label was declared and waits for the next word
    addPendingLabel?(tok: LabelDeclarationToken): void;

    // the next word is certain to be emitted: bind waiting labels to it
    flushPendingLabels?(): void;

    // output the token's value as a bit field
    write?(tok: FieldToken): void;

    // output the address of the referenced label as a word
    writeDereferencedLabel?(tok: LabelReferenceToken): void;
}
