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

import type { Cursor } from "./Cursor.js";

export type LineBreak = "\r\n" | "\r" | "\n";

// unclassified text as produced by the lexer, never empty
export interface RawToken {
    text: string;
    cursor: Cursor;
}

export type Token =
    NewlineToken | LabelDeclarationToken |
    RegisterInstructionToken | ImmediateInstructionToken |
    RegisterToken | LabelReferenceToken | LiteralToken;

// tokens that end up as a bit field in the output
export type FieldToken = RegisterInstructionToken | ImmediateInstructionToken | RegisterToken | LiteralToken;

// tokens that stand for a whole word
export type ValueToken = LiteralToken | LabelReferenceToken;

export enum TokenType {
    Newline,
    LabelDeclaration,
    RegisterInstruction,
    ImmediateInstruction,
    Register,
    LabelReference,
    Literal,
}

export interface BaseToken {
    type: TokenType;
    text: string;
    cursor: Cursor;
}

export interface NewlineToken extends BaseToken {
    type: TokenType.Newline;
    text: LineBreak;
}

export interface LabelDeclarationToken extends BaseToken {
    type: TokenType.LabelDeclaration;
    name: string;
}

export interface RegisterInstructionToken extends BaseToken {
    type: TokenType.RegisterInstruction;
    opcode: number;
}

export interface ImmediateInstructionToken extends BaseToken {
    type: TokenType.ImmediateInstruction;
    opcode: number;
}

export interface RegisterToken extends BaseToken {
    type: TokenType.Register;
    code: number;
}

export interface LabelReferenceToken extends BaseToken {
    type: TokenType.LabelReference;
    name: string;
}

export interface LiteralToken extends BaseToken {
    type: TokenType.Literal;
    value: number;
}
