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

import { ImmediateOpcodes, Registers, RegisterOpcodes, WordWidth, fitsWidth } from "../utils/Nano.js";
import { TokenType } from "./Token.js";
import type { LineBreak, RawToken, Token } from "./Token.js";

const DecimalRegex = /^[0-9]+(_[0-9]+)*$/;
const BinaryRegex = /^0b[01]+(_[01]+)*$/;

/**
 * Turns raw lexer text into a typed token. The variants are tried in a fixed
 * order and the first match wins.
 *
 * @returns the token or undefined if the text is not part of the language
 */
export function classifyToken(raw: RawToken): Token | undefined {
    const { text, cursor } = raw;

    if (isLineBreak(text)) {
        return { type: TokenType.Newline, text, cursor };
    }

    if (text.length > 1 && text.endsWith(":")) {
        return { type: TokenType.LabelDeclaration, name: text.substring(0, text.length - 1), text, cursor };
    }

    const regOp = RegisterOpcodes.get(text);
    if (regOp !== undefined) {
        return { type: TokenType.RegisterInstruction, opcode: regOp, text, cursor };
    }

    const immOp = ImmediateOpcodes.get(text);
    if (immOp !== undefined) {
        return { type: TokenType.ImmediateInstruction, opcode: immOp, text, cursor };
    }

    const reg = Registers.get(text);
    if (reg !== undefined) {
        return { type: TokenType.Register, code: reg, text, cursor };
    }

    if (text.length > 1 && text.startsWith(":")) {
        return { type: TokenType.LabelReference, name: text.substring(1), text, cursor };
    }

    const value = parseLiteral(text);
    if (value !== undefined) {
        return { type: TokenType.Literal, value, text, cursor };
    }

    return undefined;
}

/**
 * Parses an unsigned decimal or 0b-prefixed binary number with optional '_'
 * between digits.
 *
 * @returns the value or undefined if the text is no number or exceeds a word
 */
export function parseLiteral(text: string): number | undefined {
    let value: number;
    if (BinaryRegex.test(text)) {
        value = Number.parseInt(text.substring(2).replaceAll("_", ""), 2);
    } else if (DecimalRegex.test(text)) {
        value = Number.parseInt(text.replaceAll("_", ""), 10);
    } else {
        return undefined;
    }

    if (!fitsWidth(value, WordWidth)) {
        return undefined;
    }
    return value;
}

function isLineBreak(text: string): text is LineBreak {
    return text == "\r\n" || text == "\r" || text == "\n";
}
