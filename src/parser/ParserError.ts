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
import { tokenToString } from "../lexer/formatToken.js";
import type { RawToken, Token } from "../lexer/Token.js";
import { CodeError } from "../utils/CodeError.js";
import { replaceNonPrints } from "../utils/Strings.js";

export class UnrecognizedTokenError extends CodeError {
    public constructor(raw: RawToken) {
        super(`Unrecognized token '${replaceNonPrints(raw.text)}'`, raw.cursor);
        this.name = UnrecognizedTokenError.name;
    }
}

export class UnexpectedTokenError extends CodeError {
    public constructor(tok: Token, expected: string) {
        super(`Expected ${expected}, got ${tokenToString(tok)}`, tok.cursor);
        this.name = UnexpectedTokenError.name;
    }
}

export class UnexpectedEndError extends CodeError {
    public constructor(cursor: Cursor, expected: string) {
        super(`Unexpected end of input, expected ${expected}`, cursor);
        this.name = UnexpectedEndError.name;
    }
}
