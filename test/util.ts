import { NanoAsm } from "../src/NanoAsm.js";
import type { NanoAsmOptions } from "../src/NanoAsm.js";
import type { AssemblerOutput } from "../src/assembler/Assembler.js";
import { Lexer } from "../src/lexer/Lexer.js";
import { SourceReader } from "../src/lexer/SourceReader.js";
import type { RawToken } from "../src/lexer/Token.js";
import { Parser } from "../src/parser/Parser.js";
import type { Worker } from "../src/parser/Worker.js";

export const TestInput = "test.nasm";

export interface TestData extends AssemblerOutput {
    lines: string[];
}

export function lex(input: string): RawToken[] {
    return [...new Lexer(TestInput, new SourceReader(input))];
}

export function runPass(input: string, worker: Worker) {
    const parser = new Parser(new Lexer(TestInput, new SourceReader(input)), worker);
    parser.parseProgram();
}

export function assemble(input: string, opts: NanoAsmOptions = {}): TestData {
    const lines: string[] = [];
    const output = new NanoAsm(input, { inputName: TestInput, ...opts }).dump(line => lines.push(line));
    return { ...output, lines };
}
