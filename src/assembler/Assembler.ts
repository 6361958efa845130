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

import { CodeError } from "../utils/CodeError.js";
import { ParsedInstruction, ResultType } from "./Instruction.js";
import { parseInstruction } from "./InstructionEncoder.js";
import { SymbolData } from "./SymbolData.js";
import { SymbolTable } from "./SymbolTable.js";

export interface AssemblerOptions {
    symbolicAddresses?: boolean;    // false: no symbol table in pass 2, symbolic addresses are errors
}

export interface AssemblerOutput {
    instructions: readonly ParsedInstruction[];
    errors: readonly CodeError[];
    warnings: readonly CodeError[];
    symbols: ReadonlyMap<string, SymbolData>;
}

export class Assembler {
    private opts: AssemblerOptions;

    public constructor(options: AssemblerOptions) {
        this.opts = options;
    }

    public assemble(inputName: string, lines: readonly string[]): AssemblerOutput {
        // pass 1: all labels must be known before the first instruction is encoded
        const syms = new SymbolTable(inputName, lines);

        // pass 2: encode in source order, a failing line is reported and skipped
        const resolver = this.opts.symbolicAddresses === false ? undefined : syms;
        const instructions: ParsedInstruction[] = [];
        const errors: CodeError[] = [];
        const warnings: CodeError[] = [];

        for (const line of syms.getInstructions()) {
            const res = parseInstruction(line, resolver);
            switch (res.type) {
                case ResultType.Instruction:
                    instructions.push(res.instruction);
                    if (res.warning) {
                        warnings.push(res.warning);
                    }
                    break;
                case ResultType.Error:
                    errors.push(res.error);
                    break;
                case ResultType.Skip:
                    break;
            }
        }

        return {
            instructions,
            errors,
            warnings,
            symbols: syms.getSymbols(),
        };
    }
}
