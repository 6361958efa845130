/* eslint-disable max-lines-per-function */
import { InstructionType, ParseResult, ResultType } from "../../src/assembler/Instruction.js";
import { parseInstruction } from "../../src/assembler/InstructionEncoder.js";
import { SymbolResolver } from "../../src/assembler/SymbolData.js";
import { SourceLine } from "../../src/lexer/SourceLine.js";
import { ParseErrorKind } from "../../src/parser/ParseError.js";
import { Severity } from "../../src/utils/CodeError.js";

function mkLine(text: string, loc = 1): SourceLine {
    return { inputName: "test.asm", text, loc, lineNum: loc };
}

function binaryOf(res: ParseResult): string | undefined {
    return res.type == ResultType.Instruction ? res.instruction.binary : undefined;
}

const fixedResolver: SymbolResolver = {
    resolveValue: name => name == "LOOP" ? 4 : 40000,
};

describe("GIVEN an address instruction", () => {
    describe("WHEN the operand is numeric", () => {
        const res = parseInstruction(mkLine("@2"));
        test("THEN it should be encoded as a 16 bit address", () => {
            expect(res.type).toEqual(ResultType.Instruction);
            if (res.type == ResultType.Instruction) {
                expect(res.instruction.type).toEqual(InstructionType.Address);
                expect(res.instruction.binary).toEqual("0000000000000010");
                expect(res.warning).toBeUndefined();
            }
        });
    });

    describe("WHEN the operand is the largest address", () => {
        test("THEN all low bits should be set", () => {
            expect(binaryOf(parseInstruction(mkLine("@32767")))).toEqual("0111111111111111");
        });
    });

    describe("WHEN the numeric operand uses the top bit", () => {
        test("THEN it should still be encoded with all 16 bits", () => {
            expect(binaryOf(parseInstruction(mkLine("@32768")))).toEqual("1000000000000000");
            expect(binaryOf(parseInstruction(mkLine("@65535")))).toEqual("1111111111111111");
        });
    });

    describe("WHEN the numeric operand does not fit into 16 bits", () => {
        const res = parseInstruction(mkLine("@65536", 7));
        test("THEN an out of range error should be returned", () => {
            expect(res.type).toEqual(ResultType.Error);
            if (res.type == ResultType.Error) {
                expect(res.error.kind).toEqual(ParseErrorKind.AddressOutOfRange);
                expect(res.error.message).toEqual("Address out of range in 7: @65536");
            }
        });
    });

    describe("WHEN the operand is symbolic and a resolver is given", () => {
        test("THEN the resolved address should be used", () => {
            expect(binaryOf(parseInstruction(mkLine("@LOOP"), fixedResolver))).toEqual("0000000000000100");
        });

        test("THEN resolved addresses beyond the address range should be rejected", () => {
            const res = parseInstruction(mkLine("@far"), fixedResolver);
            expect(res.type == ResultType.Error && res.error.kind).toEqual(ParseErrorKind.AddressOutOfRange);
        });
    });

    describe("WHEN the operand is symbolic and no resolver is given", () => {
        const res = parseInstruction(mkLine("@LOOP", 3));
        test("THEN a missing symbol table error should be returned", () => {
            expect(res.type).toEqual(ResultType.Error);
            if (res.type == ResultType.Error) {
                expect(res.error.kind).toEqual(ParseErrorKind.MissingSymbolTable);
                expect(res.error.severity).toEqual(Severity.Error);
                expect(res.error.message).toEqual("Unresolvable symbol in 3: @LOOP");
                expect(res.error.text).toEqual("@LOOP");
                expect(res.error.loc).toEqual(3);
            }
        });
    });
});

describe("GIVEN a compute instruction", () => {
    const expectations: [string, string][] = [
        ["D=D+1", "1110011111010000"],
        ["D=A", "1110110000010000"],
        ["0;JMP", "1110101010000111"],
        ["AMD=M-1;JNE", "1111110010111101"],
        ["AM=M+1", "1111110111101000"],
        ["-1", "1110111010000000"],
        ["A-D", "1110000111000000"],
        ["D|M", "1111010101000000"],
        ["M=D+M", "1111000010001000"],
    ];

    for (const [text, binary] of expectations) {
        describe(`WHEN encoding ${text}`, () => {
            const res = parseInstruction(mkLine(text));
            test("THEN it should yield comp, dest and jump bits in that order", () => {
                expect(res.type == ResultType.Instruction && res.instruction.type).toEqual(InstructionType.Compute);
                expect(binaryOf(res)).toEqual(binary);
            });
        });
    }

    describe("WHEN the line still contains whitespace and a comment", () => {
        const res = parseInstruction(mkLine("  D = M   // load"));
        test("THEN it should be sanitized first", () => {
            expect(binaryOf(res)).toEqual("1111110000010000");
            expect(res.type == ResultType.Instruction && res.instruction.source.text).toEqual("D=M");
        });
    });

    describe("WHEN unrecognized text follows the instruction", () => {
        const res = parseInstruction(mkLine("Memory=Address", 5));
        test("THEN it should still be encoded but carry a warning", () => {
            expect(binaryOf(res)).toEqual("1111110000000000");
            if (res.type == ResultType.Instruction) {
                expect(res.warning?.kind).toEqual(ParseErrorKind.TrailingText);
                expect(res.warning?.severity).toEqual(Severity.Warning);
                expect(res.warning?.message).toEqual("Trailing text ignored in 5: Memory=Address");
            }
        });
    });
});

describe("GIVEN lines that produce no instruction", () => {
    describe("WHEN the line is a label declaration, empty or only a comment", () => {
        test("THEN it should be skipped", () => {
            expect(parseInstruction(mkLine("(LOOP)")).type).toEqual(ResultType.Skip);
            expect(parseInstruction(mkLine("")).type).toEqual(ResultType.Skip);
            expect(parseInstruction(mkLine("   // nothing")).type).toEqual(ResultType.Skip);
        });
    });

    describe("WHEN the line is neither address nor compute instruction", () => {
        const res = parseInstruction(mkLine("foo", 3));
        test("THEN an unknown instruction error should be returned", () => {
            expect(res.type).toEqual(ResultType.Error);
            if (res.type == ResultType.Error) {
                expect(res.error.kind).toEqual(ParseErrorKind.UnknownInstruction);
                expect(res.error.message).toEqual("Error parsing 3: foo");
                expect(res.error.inputName).toEqual("test.asm");
                expect(res.error.line).toEqual(3);
            }
        });
    });

    describe("WHEN the address operand is missing", () => {
        test("THEN the empty name should be resolved like any other symbol", () => {
            const names: string[] = [];
            const res = parseInstruction(mkLine("@"), {
                resolveValue: name => {
                    names.push(name);
                    return 16;
                },
            });
            expect(names).toEqual([""]);
            expect(binaryOf(res)).toEqual("0000000000010000");
        });
    });
});
