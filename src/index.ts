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

export * from "./NanoAsm.js";
export * from "./lexer/Cursor.js";
export * from "./lexer/Lexer.js";
export * from "./lexer/SourceReader.js";
export * from "./lexer/Token.js";
export * from "./lexer/classifyToken.js";
export * from "./lexer/formatToken.js";
export * from "./parser/Parser.js";
export * from "./parser/ParserError.js";
export * from "./parser/Worker.js";
export * from "./assembler/Assembler.js";
export * from "./assembler/AssemblerError.js";
export * from "./assembler/BitWordBuffer.js";
export * from "./assembler/LabelCollector.js";
export * from "./assembler/Translator.js";
export * from "./outputs/BinaryDumpWriter.js";
export * from "./outputs/HexPatchWriter.js";
export * from "./outputs/SramFile.js";
export * from "./outputs/SramLayout.js";
export * from "./outputs/WordCounter.js";
export * from "./outputs/WordWriter.js";
export * from "./utils/CodeError.js";
export * from "./utils/Nano.js";
