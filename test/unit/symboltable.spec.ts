/* eslint-disable max-lines-per-function */
import { SymbolType } from "../../src/assembler/SymbolData.js";
import { SymbolTable } from "../../src/assembler/SymbolTable.js";

function mkTable(src: string): SymbolTable {
    return new SymbolTable("test.asm", src.split("\n"));
}

describe("GIVEN a new symbol table", () => {
    const syms = mkTable("");

    describe("WHEN looking up built-in symbols", () => {
        test("THEN registers should map to their numbers", () => {
            for (let i = 0; i < 16; i++) {
                expect(syms.lookup(`R${i}`)).toEqual({ type: SymbolType.Register, name: `R${i}`, value: i });
            }
        });

        test("THEN reserved names should map to their fixed addresses", () => {
            expect(syms.resolve("SP")).toEqual("0000000000000000");
            expect(syms.resolve("LCL")).toEqual("0000000000000001");
            expect(syms.resolve("ARG")).toEqual("0000000000000010");
            expect(syms.resolve("THIS")).toEqual("0000000000000011");
            expect(syms.resolve("THAT")).toEqual("0000000000000100");
            expect(syms.resolve("SCREEN")).toEqual("0100000000000000");
            expect(syms.resolve("KBD")).toEqual("0110000000000000");
            expect(syms.lookup("KBD").type).toEqual(SymbolType.Reserved);
        });

        test("THEN no instructions should be present", () => {
            expect(syms.getInstructions()).toEqual([]);
            expect(syms.getSymbols().size).toEqual(23);
        });
    });
});

describe("GIVEN a source with labels", () => {
    describe("WHEN a label precedes its first use", () => {
        const syms = mkTable("(LOOP)\n@LOOP");
        test("THEN it should resolve to the following instruction", () => {
            expect(syms.resolve("LOOP")).toEqual("0000000000000000");
            expect(syms.getInstructions()).toEqual([
                { inputName: "test.asm", text: "@LOOP", loc: 1, lineNum: 2 },
            ]);
        });
    });

    describe("WHEN a label is declared after its use", () => {
        const syms = mkTable("@END\n0;JMP\n(END)\n@END\n0;JMP");
        test("THEN it should already be known after construction", () => {
            expect(syms.lookup("END")).toEqual({ type: SymbolType.Label, name: "END", value: 2 });
        });
    });

    describe("WHEN the source contains comments, blank lines and whitespace", () => {
        const syms = mkTable("\n// header\n  @1 // one\n(A)\n\tD = M");
        test("THEN only instructions should be counted", () => {
            expect(syms.lookup("A").value).toEqual(1);
            expect(syms.getInstructions()).toEqual([
                { inputName: "test.asm", text: "@1", loc: 1, lineNum: 3 },
                { inputName: "test.asm", text: "D=M", loc: 2, lineNum: 5 },
            ]);
        });
    });

    describe("WHEN a label is declared twice", () => {
        const syms = mkTable("(X)\n@1\n(X)\n@2");
        test("THEN the last declaration should win", () => {
            expect(syms.lookup("X").value).toEqual(1);
        });
    });

    describe("WHEN a label reuses a built-in name", () => {
        const syms = mkTable("@1\n(SP)\nD=A");
        test("THEN the label should replace the built-in value", () => {
            expect(syms.lookup("SP")).toEqual({ type: SymbolType.Label, name: "SP", value: 1 });
        });
    });
});

describe("GIVEN unknown symbols", () => {
    describe("WHEN resolving them", () => {
        const syms = mkTable("(LOOP)\n@LOOP");
        const first = syms.resolve("counter");
        const second = syms.resolve("limit");
        const again = syms.resolve("counter");
        test("THEN they should become variables starting at 16", () => {
            expect(first).toEqual("0000000000010000");
            expect(second).toEqual("0000000000010001");
            expect(again).toEqual(first);
            expect(syms.lookup("limit")).toEqual({ type: SymbolType.Variable, name: "limit", value: 17 });
        });
    });

    describe("WHEN only looking them up", () => {
        const syms = mkTable("");
        test("THEN no variable should be allocated", () => {
            expect(syms.tryLookup("x")).toBeUndefined();
            expect(() => syms.lookup("x")).toThrow("Symbol x not defined");
            expect(syms.resolveValue("y")).toEqual(16);
        });
    });

    describe("WHEN two tables are built", () => {
        const a = mkTable("");
        const b = mkTable("");
        a.resolveValue("first");
        test("THEN their variable counters should be independent", () => {
            expect(b.resolveValue("other")).toEqual(16);
            expect(a.resolveValue("second")).toEqual(17);
        });
    });
});
