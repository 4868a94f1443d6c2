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
import type { SourceReader } from "./SourceReader.js";
import type { RawToken } from "./Token.js";

enum LexerState {
    Whitespace,
    Newline,    // inside a line break that started with CR
    Comment,
    Text,
}

enum CharClass {
    Blank,
    CR,
    LF,
    CommentStart,
    Other,
}

/**
 * Splits the character source into raw tokens. Blanks and comments are
 * dropped, every line break becomes a token of its own.
 *
 * The lexer pulls characters lazily. Once the source is exhausted it keeps
 * returning undefined; to scan again, seek the source to the start and
 * create a new lexer.
 */
export class Lexer {
    private inputName: string;
    private source: SourceReader;
    private cursor: Cursor;

    public constructor(inputName: string, source: SourceReader) {
        this.inputName = inputName;
        this.source = source;
        this.cursor = {
            inputName: inputName,
            lineIdx: 0,
            colIdx: 0,
        };
    }

    public getCursor(): Cursor {
        return this.cursor;
    }

    public next(): RawToken | undefined {
        let state = LexerState.Whitespace;
        let start = this.cursor;
        let text = "";

        while (true) {
            const chr = this.source.peek();
            const cls = chr === undefined ? undefined : this.classifyChar(chr);

            switch (state) {
                case LexerState.Whitespace:
                    switch (cls) {
                        case undefined:
                            return undefined;
                        case CharClass.Blank:
                            this.advance();
                            break;
                        case CharClass.CommentStart:
                            this.advance();
                            state = LexerState.Comment;
                            break;
                        case CharClass.LF:
                            start = this.cursor;
                            text = this.advance();
                            return this.endLine(start, text);
                        case CharClass.CR:
                            start = this.cursor;
                            text = this.advance();
                            state = LexerState.Newline;
                            break;
                        case CharClass.Other:
                            start = this.cursor;
                            text = this.advance();
                            state = LexerState.Text;
                            break;
                    }
                    break;
                case LexerState.Comment:
                    if (cls === undefined) {
                        return undefined;
                    } else if (cls == CharClass.CR || cls == CharClass.LF) {
                        state = LexerState.Whitespace;
                    } else {
                        this.advance();
                    }
                    break;
                case LexerState.Newline:
                    if (cls == CharClass.LF) {
                        text += this.advance();
                    }
                    return this.endLine(start, text);
                case LexerState.Text:
                    if (cls != CharClass.Other) {
                        return { text, cursor: start };
                    }
                    text += this.advance();
                    break;
            }
        }
    }

    public [Symbol.iterator](): Iterator<RawToken> {
        return {
            next: () => {
                const tok = this.next();
                if (tok) {
                    return { value: tok, done: false };
                }
                return { value: undefined, done: true };
            },
        };
    }

    private classifyChar(chr: string): CharClass {
        switch (chr) {
            case " ":
            case "\t":
                return CharClass.Blank;
            case "\r":
                return CharClass.CR;
            case "\n":
                return CharClass.LF;
            case ";":
                return CharClass.CommentStart;
            default:
                return CharClass.Other;
        }
    }

    private advance(): string {
        const chr = this.source.read();
        if (chr === undefined) {
            throw Error("Read past end of source");
        }
        // new object so that cursors held by earlier tokens keep their state
        this.cursor = { ...this.cursor, colIdx: this.cursor.colIdx + 1 };
        return chr;
    }

    private endLine(start: Cursor, text: string): RawToken {
        this.cursor = {
            inputName: this.inputName,
            lineIdx: this.cursor.lineIdx + 1,
            colIdx: 0,
        };
        return { text, cursor: start };
    }
}
