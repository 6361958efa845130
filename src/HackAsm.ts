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

import { Assembler, AssemblerOptions } from "./assembler/Assembler.js";
import { ParsedInstruction } from "./assembler/Instruction.js";
import { SymbolData } from "./assembler/SymbolData.js";
import { HackWriter } from "./formats/HackWriter.js";
import { dumpSymbols } from "./formats/dumpSymbols.js";
import { CodeError } from "./utils/CodeError.js";

export interface HackAsmOptions extends AssemblerOptions {
    listSymbols?: boolean;
};

export interface HackAsmOutput {
    hack: string;
    instructions: readonly ParsedInstruction[];
    errors: readonly CodeError[];
    warnings: readonly CodeError[];
    symbols: ReadonlyMap<string, SymbolData>;
    symbolListing?: string;
}

export class HackAsm {
    private asm: Assembler;
    private opts: HackAsmOptions;

    public constructor(opts: HackAsmOptions) {
        this.opts = opts;
        this.asm = new Assembler(opts);
    }

    public run(inputName: string, source: string): HackAsmOutput {
        const result = this.asm.assemble(inputName, source.split(/\r?\n/));

        const writer = new HackWriter();
        result.instructions.forEach(inst => writer.writeWord(inst.binary));

        const output: HackAsmOutput = { ...result, hack: writer.finish() };
        if (this.opts.listSymbols) {
            let listing = "";
            dumpSymbols(result.symbols, line => listing += line + "\n");
            output.symbolListing = listing;
        }

        return output;
    }
}
