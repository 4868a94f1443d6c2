import { CapacityError, UndeclaredLabelError, ValueRangeError } from "../../src/assembler/AssemblerError.js";
import { UnexpectedTokenError } from "../../src/parser/ParserError.js";
import { formatCodeError } from "../../src/utils/CodeError.js";
import { assemble } from "../util.js";

describe("GIVEN a program without code", () => {
    describe("WHEN assembling blank lines, blanks and comments", () => {
        const data = assemble("\n\n  ; nothing\r\n\t\n;\r");

        test("THEN it should succeed without words", () => {
            expect(data.errors).toEqual([]);
            expect(data.lines).toEqual([]);
            expect(data.wordCount).toEqual(0);
        });
    });
});

describe("GIVEN a single instruction", () => {
    test("THEN mv R1 R2 should be opcode, R1 and R2", () => {
        expect(assemble("mv R1 R2\n").lines).toEqual(["000001010"]);
    });

    test("THEN and PC R6 should use the highest codes", () => {
        expect(assemble("and PC R6").lines).toEqual(["111111110"]);
    });

    test("THEN CRLF line breaks should work the same", () => {
        expect(assemble("ld R4 R0\r\nst R0 R4\r\n").lines).toEqual(["100100000", "101000100"]);
    });
});

describe("GIVEN a program with labels", () => {
    describe("WHEN a label is used before it is declared", () => {
        const data = assemble([
            "mv R1 R2",
            "loop:",
            "add R1 R2",
            "mvi R3",
            ":loop",
        ].join("\n"));

        test("THEN the reference should resolve to the labelled word", () => {
            expect(data.errors).toEqual([]);
            expect(data.labels.get("loop")).toEqual(1);
            expect(data.lines).toEqual(["000001010", "010001010", "001011000", "000000001"]);
            expect(data.wordCount).toEqual(4);
        });
    });

    describe("WHEN literals are written in several formats", () => {
        const data = assemble([
            "start:  mvi R0",
            "        0b1_0000_0000     ; 256",
            "        mvi PC",
            "        :start",
            "data:   1_0",
        ].join("\n"));

        test("THEN they should encode the same values", () => {
            expect(data.lines).toEqual(["001000000", "100000000", "001111000", "000000000", "000001010"]);
            expect([...data.labels]).toEqual([["start", 0], ["data", 4]]);
        });
    });

    describe("WHEN a label is redeclared", () => {
        const data = assemble([
            "a:",
            "mv R0 R0",
            "a:",
            "mvnz R0 R0",
            "mvi R1",
            ":a",
        ].join("\n"));

        test("THEN it should warn but still assemble with the last address", () => {
            expect(data.errors).toEqual([]);
            expect(data.warnings).toEqual(["Label 'a' redeclared at 3:1"]);
            expect(data.lines[3]).toEqual("000000001");
        });
    });

    describe("WHEN labels are undeclared", () => {
        const data = assemble("mvi R1\n:missing\nmvi R2\n:gone\n");

        test("THEN all references should be reported and nothing written", () => {
            expect(data.errors.every(e => e instanceof UndeclaredLabelError)).toBe(true);
            expect(data.errors.map(formatCodeError)).toEqual([
                "test.nasm:2:1: Label 'missing' is not declared",
                "test.nasm:4:1: Label 'gone' is not declared",
            ]);
            expect(data.lines).toEqual([]);
            expect(data.wordCount).toEqual(0);
        });
    });

    describe("WHEN a label lies beyond the address space", () => {
        const data = assemble("0\n".repeat(512) + "far:\n1\nmvi R0\n:far\n");

        test("THEN its reference should fail", () => {
            expect(data.errors).toHaveLength(1);
            expect(data.errors[0]).toBeInstanceOf(ValueRangeError);
            expect(formatCodeError(data.errors[0])).toEqual("test.nasm:516:1: Address 512 of label 'far' does not fit into 9 bits");
            expect(data.lines).toEqual([]);
        });
    });
});

describe("GIVEN a program with syntax errors", () => {
    const data = assemble("mvi R1\n5\nmv R1\nadd R1 R2\n");

    test("THEN the first error should stop assembly", () => {
        expect(data.errors).toHaveLength(1);
        expect(data.errors[0]).toBeInstanceOf(UnexpectedTokenError);
        expect(formatCodeError(data.errors[0])).toEqual("test.nasm:3:6: Expected register, got Newline('<LF>')");
        expect(data.lines).toEqual([]);
        expect(data.warnings).toEqual([]);
    });

    test("THEN a truncated instruction at the end should fail", () => {
        expect(assemble("mvi R2").errors.map(formatCodeError))
            .toEqual(["test.nasm:1:7: Unexpected end of input, expected end of line"]);
    });
});

describe("GIVEN a word limit", () => {
    test("THEN a program that fits should be written", () => {
        expect(assemble("5\n6\n", { capacity: 2 }).lines).toEqual(["000000101", "000000110"]);
    });

    test("THEN a program that is too large should be rejected before writing", () => {
        const data = assemble("5\n6\n7\n", { capacity: 2 });
        expect(data.errors[0]).toBeInstanceOf(CapacityError);
        expect(data.errors.map(formatCodeError)).toEqual(["test.nasm:3:1: Program needs 3 words but the destination holds 2"]);
        expect(data.lines).toEqual([]);
    });
});
