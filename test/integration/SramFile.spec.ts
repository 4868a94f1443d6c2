import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { NanoAsm } from "../../src/NanoAsm.js";
import { CapacityError } from "../../src/assembler/AssemblerError.js";
import { DestinationFormatError } from "../../src/outputs/SramFile.js";
import { DefaultSramHeader, DefaultSramLayout, createSramLayout, renderBlankSram } from "../../src/outputs/SramLayout.js";
import { formatCodeError } from "../../src/utils/CodeError.js";

const zeros = "0".repeat(72);
const blank = renderBlankSram(DefaultSramLayout, DefaultSramHeader);

function withLine(content: string, idx: number, digits: string): string {
    return content.replace(`init[${idx}] = 288'h${zeros};`, `init[${idx}] = 288'h${digits};`);
}

describe("GIVEN an SRAM module file", () => {
    let dir: string;
    let path: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), "nanoasm-"));
        path = join(dir, "sram.v");
        writeFileSync(path, blank);
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    describe("WHEN patching a single instruction", () => {
        test("THEN the first line should hold it and the rest stay zero", () => {
            const output = new NanoAsm("mv R1 R2\n").patch(path);
            expect(output.errors).toEqual([]);
            expect(readFileSync(path, "latin1")).toEqual(withLine(blank, 0, "0".repeat(71) + "A"));
        });
    });

    describe("WHEN patching a program over an older one", () => {
        test("THEN every line should be rewritten", () => {
            writeFileSync(path, withLine(withLine(blank, 0, "F".repeat(72)), 15, "1".repeat(72)));
            const output = new NanoAsm("mv R1 R2\nloop:\nadd R1 R2\nmvi R3\n:loop\n").patch(path);
            expect(output.errors).toEqual([]);
            expect(output.wordCount).toEqual(4);
            expect(readFileSync(path, "latin1")).toEqual(withLine(blank, 0, "0".repeat(65) + "961140A"));
        });
    });

    describe("WHEN the program spans several lines", () => {
        test("THEN word 32 should start the second line", () => {
            const output = new NanoAsm("0\n".repeat(32) + "3\n").patch(path);
            expect(output.errors).toEqual([]);
            expect(readFileSync(path, "latin1")).toEqual(withLine(blank, 1, "0".repeat(71) + "3"));
        });
    });

    describe("WHEN the file does not have the expected lines", () => {
        test("THEN assembly should fail and leave the file untouched", () => {
            const broken = blank.replace("init[3] =", "init[3]  =");
            writeFileSync(path, broken);
            const output = new NanoAsm("mv R1 R2\n").patch(path);
            expect(output.errors).toHaveLength(1);
            expect(output.errors[0]).toBeInstanceOf(DestinationFormatError);
            expect(formatCodeError(output.errors[0])).toEqual(`${path}:22:1: Memory line 3 must start with '        init[3] = 288'h'`);
            expect(readFileSync(path, "latin1")).toEqual(broken);
        });
    });

    describe("WHEN the program does not fit", () => {
        test("THEN assembly should fail and leave the file untouched", () => {
            const output = new NanoAsm("0\n".repeat(513), { inputName: "big.nasm" }).patch(path);
            expect(output.errors[0]).toBeInstanceOf(CapacityError);
            expect(formatCodeError(output.errors[0])).toEqual("big.nasm:513:1: Program needs 513 words but the destination holds 512");
            expect(readFileSync(path, "latin1")).toEqual(blank);
        });
    });

    describe("WHEN the program has errors", () => {
        test("THEN the file should stay untouched", () => {
            const output = new NanoAsm("mvi R1\n:nothing\n").patch(path);
            expect(output.errors).toHaveLength(1);
            expect(readFileSync(path, "latin1")).toEqual(blank);
        });
    });

    describe("WHEN using a custom layout", () => {
        // the header is 6 bytes but only 5 characters
        const header = Buffer.from("// é\n", "utf-8");
        const layout = createSramLayout({
            offset: header.length,
            lineCount: 2,
            wordsPerLine: 4,
            prefix: idx => `m${idx}=`,
            suffix: () => ";\n",
            footer: "end\n",
        });

        test("THEN bytes before the region should be kept and the footer replace the rest", () => {
            writeFileSync(path, Buffer.concat([header, Buffer.from("m0=000000000;\nm1=000000000;\nold trailer\n", "latin1")]));
            const output = new NanoAsm("5\n6\n7\n8\n9\n").patch(path, layout);
            expect(output.errors).toEqual([]);

            const patched = readFileSync(path);
            expect(patched.subarray(0, header.length).equals(header)).toBe(true);
            expect(patched.subarray(header.length).toString("latin1")).toEqual("m0=0401C0C05;\nm1=000000009;\nend\n");
        });
    });
});
