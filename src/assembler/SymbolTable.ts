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

import { isLabelDeclaration, sanitizeLine } from "../lexer/Sanitizer.js";
import { SourceLine } from "../lexer/SourceLine.js";
import * as Hack from "../utils/Hack.js";
import { toMachineWord } from "../utils/Strings.js";
import { SymbolData, SymbolResolver, SymbolType } from "./SymbolData.js";

/**
 * Symbols of a single assembler run. Construction performs the first pass:
 * built-in symbols are seeded, then every label declaration is bound to the
 * index of the instruction following it. Variables are added on demand by
 * {@link SymbolTable.resolve} during the second pass.
 */
export class SymbolTable implements SymbolResolver {
    private symbols = new Map<string, SymbolData>();
    private instructions: SourceLine[] = [];
    private nextVariable = Hack.FirstVariableAddress;

    public constructor(inputName: string, lines: readonly string[]) {
        this.seed();
        this.scan(inputName, lines);
    }

    private seed() {
        for (let i = 0; i < Hack.NumRegisters; i++) {
            this.define(SymbolType.Register, Hack.registerName(i), i);
        }

        for (const [name, value] of Hack.ReservedSymbols) {
            this.define(SymbolType.Reserved, name, value);
        }
    }

    private scan(inputName: string, lines: readonly string[]) {
        lines.forEach((raw, idx) => {
            const text = sanitizeLine(raw);
            if (text.length == 0) {
                return;
            }

            if (isLabelDeclaration(text)) {
                // later declarations replace earlier ones, including built-in symbols
                this.define(SymbolType.Label, text.substring(1, text.length - 1), this.instructions.length);
            } else {
                this.instructions.push({
                    inputName: inputName,
                    text: text,
                    loc: this.instructions.length + 1,
                    lineNum: idx + 1,
                });
            }
        });
    }

    private define(type: SymbolType, name: string, value: number) {
        this.symbols.set(name, { type, name, value });
    }

    public resolve(name: string): string {
        return toMachineWord(this.resolveValue(name));
    }

    public resolveValue(name: string): number {
        const existing = this.symbols.get(name);
        if (existing) {
            return existing.value;
        }

        const addr = this.nextVariable++;
        this.define(SymbolType.Variable, name, addr);
        return addr;
    }

    public tryLookup(name: string): SymbolData | undefined {
        return this.symbols.get(name);
    }

    public lookup(name: string): SymbolData {
        const sym = this.tryLookup(name);
        if (sym === undefined) {
            throw Error(`Symbol ${name} not defined`);
        }
        return sym;
    }

    public getInstructions(): readonly SourceLine[] {
        return this.instructions;
    }

    public getSymbols(): ReadonlyMap<string, SymbolData> {
        return this.symbols;
    }
}
