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
import type { LabelReferenceToken } from "../lexer/Token.js";
import { CodeError } from "../utils/CodeError.js";

export class UndeclaredLabelError extends CodeError {
    public constructor(tok: LabelReferenceToken) {
        super(`Label '${tok.name}' is not declared`, tok.cursor);
        this.name = UndeclaredLabelError.name;
    }
}

export class ValueRangeError extends CodeError {
    public constructor(msg: string, cursor: Cursor) {
        super(msg, cursor);
        this.name = ValueRangeError.name;
    }
}

export class CapacityError extends CodeError {
    public constructor(wordCount: number, capacity: number, firstExcess: Cursor) {
        super(`Program needs ${wordCount} words but the destination holds ${capacity}`, firstExcess);
        this.name = CapacityError.name;
    }
}
