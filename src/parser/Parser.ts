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

import { classifyToken } from "../lexer/classifyToken.js";
import type { Lexer } from "../lexer/Lexer.js";
import { TokenType } from "../lexer/Token.js";
import type { RegisterToken, Token, ValueToken } from "../lexer/Token.js";
import { UnexpectedEndError, UnexpectedTokenError, UnrecognizedTokenError } from "./ParserError.js";
import type { Worker } from "./Worker.js";

enum ParserState {
    Initial,
    RegisterInstruction,    // operand: first register, second register, end of line
    ImmediateInstruction,   // operand: register, end of line, value on a later line
    NumericValue,
}

/**
 * Grammar of the assembly language as a state machine over classified tokens.
 * The parser keeps no program state of its own, all effects go through the worker
 * so that the same traversal can collect labels or emit code.
 *
 * Lines are:
 *   label:                  declares a label for the next word
 *   op Rx Ry                one word: opcode, Rx, Ry
 *   mvi Rx                  one word: opcode, Rx, 0
 *   value                   one word, literal or :label, after mvi or on its own
 */
export class Parser {
    private lexer: Lexer;
    private worker: Worker;
    private state = ParserState.Initial;
    private operand = 0;

    public constructor(lexer: Lexer, worker: Worker) {
        this.lexer = lexer;
        this.worker = worker;
    }

    /**
     * Runs the grammar over the whole input.
     * Throws a CodeError on the first token that does not fit.
     */
    public parseProgram() {
        while (true) {
            const raw = this.lexer.next();
            if (!raw) {
                break;
            }

            const tok = classifyToken(raw);
            if (!tok) {
                throw new UnrecognizedTokenError(raw);
            }

            this.handleToken(tok);
        }

        if (!this.isWordComplete()) {
            throw new UnexpectedEndError(this.lexer.getCursor(), this.getExpectation());
        }
        this.state = ParserState.Initial;
    }

    private handleToken(tok: Token) {
        switch (this.state) {
            case ParserState.Initial:               return this.handleInitial(tok);
            case ParserState.RegisterInstruction:   return this.handleRegisterInstruction(tok);
            case ParserState.ImmediateInstruction:  return this.handleImmediateInstruction(tok);
            case ParserState.NumericValue:          return this.handleNumericValue(tok);
        }
    }

    private handleInitial(tok: Token) {
        switch (tok.type) {
            case TokenType.Newline:
                return;
            case TokenType.LabelDeclaration:
                this.worker.addPendingLabel?.(tok);
                return;
            case TokenType.RegisterInstruction:
                this.worker.write?.(tok);
                this.enter(ParserState.RegisterInstruction);
                return;
            case TokenType.ImmediateInstruction:
                this.worker.write?.(tok);
                this.enter(ParserState.ImmediateInstruction);
                return;
            case TokenType.Literal:
            case TokenType.LabelReference:
                this.writeValue(tok);
                return;
        }
        throw new UnexpectedTokenError(tok, this.getExpectation());
    }

    private handleRegisterInstruction(tok: Token) {
        switch (this.operand) {
            case 0:
                if (tok.type == TokenType.Register) {
                    this.worker.write?.(tok);
                    this.operand++;
                    return;
                }
                break;
            case 1:
                if (tok.type == TokenType.Register) {
                    this.worker.flushPendingLabels?.();
                    this.worker.write?.(tok);
                    this.operand++;
                    return;
                }
                break;
            case 2:
                if (tok.type == TokenType.Newline) {
                    this.enter(ParserState.Initial);
                    return;
                }
                break;
        }
        throw new UnexpectedTokenError(tok, this.getExpectation());
    }

    private handleImmediateInstruction(tok: Token) {
        switch (this.operand) {
            case 0:
                if (tok.type == TokenType.Register) {
                    this.worker.flushPendingLabels?.();
                    this.worker.write?.(tok);
                    // the second register slot is unused by immediate instructions
                    this.worker.write?.(this.unusedRegister(tok));
                    this.operand++;
                    return;
                }
                break;
            case 1:
                if (tok.type == TokenType.Newline) {
                    this.operand++;
                    return;
                }
                break;
            case 2:
                switch (tok.type) {
                    case TokenType.Newline:
                        return;
                    case TokenType.LabelDeclaration:
                        this.worker.addPendingLabel?.(tok);
                        return;
                    case TokenType.Literal:
                    case TokenType.LabelReference:
                        this.writeValue(tok);
                        return;
                }
                break;
        }
        throw new UnexpectedTokenError(tok, this.getExpectation());
    }

    private handleNumericValue(tok: Token) {
        if (tok.type == TokenType.Newline) {
            this.enter(ParserState.Initial);
            return;
        }
        throw new UnexpectedTokenError(tok, this.getExpectation());
    }

    private writeValue(tok: ValueToken) {
        this.worker.flushPendingLabels?.();
        if (tok.type == TokenType.Literal) {
            this.worker.write?.(tok);
        } else {
            this.worker.writeDereferencedLabel?.(tok);
        }
        this.enter(ParserState.NumericValue);
    }

    private unusedRegister(tok: RegisterToken): RegisterToken {
        return { type: TokenType.Register, code: 0, text: "", cursor: tok.cursor };
    }

    private enter(state: ParserState) {
        this.state = state;
        this.operand = 0;
    }

    // whether input may end here without leaving a partial word behind
    private isWordComplete(): boolean {
        switch (this.state) {
            case ParserState.Initial:
            case ParserState.NumericValue:
                return true;
            case ParserState.RegisterInstruction:
                return this.operand == 2;
            case ParserState.ImmediateInstruction:
                return false;
        }
    }

    private getExpectation(): string {
        switch (this.state) {
            case ParserState.Initial:
                return "instruction, label or value";
            case ParserState.RegisterInstruction:
                return this.operand < 2 ? "register" : "end of line";
            case ParserState.ImmediateInstruction:
                switch (this.operand) {
                    case 0:     return "register";
                    case 1:     return "end of line";
                    default:    return "value or label";
                }
            case ParserState.NumericValue:
                return "end of line";
        }
    }
}
