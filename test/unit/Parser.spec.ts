import { TokenType } from "../../src/lexer/Token.js";
import type { FieldToken } from "../../src/lexer/Token.js";
import { UnexpectedEndError, UnexpectedTokenError, UnrecognizedTokenError } from "../../src/parser/ParserError.js";
import type { Worker } from "../../src/parser/Worker.js";
import { formatCodeError } from "../../src/utils/CodeError.js";
import { runPass } from "../util.js";

function fieldToString(tok: FieldToken): string {
    switch (tok.type) {
        case TokenType.RegisterInstruction:
        case TokenType.ImmediateInstruction:
            return `op ${tok.opcode}`;
        case TokenType.Register:
            return `reg ${tok.code}`;
        case TokenType.Literal:
            return `lit ${tok.value}`;
    }
}

function trace(input: string): string[] {
    const events: string[] = [];
    const worker: Worker = {
        addPendingLabel: tok => events.push(`label ${tok.name}`),
        flushPendingLabels: () => events.push("flush"),
        write: tok => events.push(`write ${fieldToString(tok)}`),
        writeDereferencedLabel: tok => events.push(`deref ${tok.name}`),
    };
    runPass(input, worker);
    return events;
}

function parseError(input: string): Error {
    try {
        runPass(input, {});
    } catch (e) {
        if (e instanceof Error) {
            return e;
        }
    }
    throw Error("Expected the parser to fail");
}

describe("GIVEN the parser", () => {
    describe("WHEN parsing a register instruction", () => {
        test("THEN labels should be flushed before the second register", () => {
            expect(trace("mv R1 R2\n")).toEqual(["write op 0", "write reg 1", "flush", "write reg 2"]);
        });
    });

    describe("WHEN parsing an immediate instruction", () => {
        test("THEN it should write a zero register and take its value from a later line", () => {
            expect(trace("a:\nmvi R3\n\nb:\n:a\n")).toEqual([
                "label a",
                "write op 1",
                "flush",
                "write reg 3",
                "write reg 0",
                "label b",
                "flush",
                "deref a",
            ]);
        });
    });

    describe("WHEN parsing bare values", () => {
        test("THEN each should be flushed as a word of its own", () => {
            expect(trace("5\n:x\n")).toEqual(["flush", "write lit 5", "flush", "deref x"]);
        });

        test("THEN a label on the same line should be bound to the value", () => {
            expect(trace("x: 5\n")).toEqual(["label x", "flush", "write lit 5"]);
        });
    });

    describe("WHEN the input has only blank lines and comments", () => {
        test("THEN no events should happen", () => {
            expect(trace("\n\r\n ; nothing here\n\n")).toEqual([]);
        });
    });

    describe("WHEN the worker handles nothing", () => {
        test("THEN parsing should still succeed", () => {
            expect(() => runPass("x:\nmv R1 R2\nmvi R1\n:x\n", {})).not.toThrow();
        });
    });

    describe("WHEN the input does not follow the grammar", () => {
        const expectations: [string, string][] = [
            ["mv R1 5\n", "test.nasm:1:7: Expected register, got Literal(5)"],
            ["mv R1\n", "test.nasm:1:6: Expected register, got Newline('<LF>')"],
            ["mv R1 R2 R3\n", "test.nasm:1:10: Expected end of line, got Register(R3)"],
            ["mvi R1 5\n", "test.nasm:1:8: Expected end of line, got Literal(5)"],
            ["mvi 5\n", "test.nasm:1:5: Expected register, got Literal(5)"],
            ["mvi R1\nmv R1 R2\n", "test.nasm:2:1: Expected value or label, got RegisterInstruction(mv)"],
            ["R1\n", "test.nasm:1:1: Expected instruction, label or value, got Register(R1)"],
            ["5 6\n", "test.nasm:1:3: Expected end of line, got Literal(6)"],
        ];

        for (const [input, message] of expectations) {
            test(`THEN ${JSON.stringify(input)} should fail with an unexpected token`, () => {
                const err = parseError(input);
                expect(err).toBeInstanceOf(UnexpectedTokenError);
                expect(err instanceof UnexpectedTokenError && formatCodeError(err)).toEqual(message);
            });
        }

        test("THEN unknown words should fail as unrecognized", () => {
            const err = parseError("\n  foo R1 R2\n");
            expect(err).toBeInstanceOf(UnrecognizedTokenError);
            expect(err instanceof UnrecognizedTokenError && formatCodeError(err)).toEqual("test.nasm:2:3: Unrecognized token 'foo'");
        });
    });

    describe("WHEN the input ends", () => {
        test("THEN a complete last word should not need a line break", () => {
            expect(() => runPass("mv R1 R2", {})).not.toThrow();
            expect(() => runPass("mvi R3\n:loop", {})).not.toThrow();
        });

        const expectations: [string, string][] = [
            ["mv R1", "test.nasm:1:6: Unexpected end of input, expected register"],
            ["mvi R2", "test.nasm:1:7: Unexpected end of input, expected end of line"],
            ["mvi R2\n\n", "test.nasm:3:1: Unexpected end of input, expected value or label"],
        ];

        for (const [input, message] of expectations) {
            test(`THEN ${JSON.stringify(input)} should fail inside a word`, () => {
                const err = parseError(input);
                expect(err).toBeInstanceOf(UnexpectedEndError);
                expect(err instanceof UnexpectedEndError && formatCodeError(err)).toEqual(message);
            });
        }
    });
});
