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

import { SymbolData, SymbolType } from "../assembler/SymbolData.js";

export function dumpSymbols(symbols: ReadonlyMap<string, SymbolData>, write: (line: string) => void) {
    const sorted = [...symbols.values()].sort((a, b) => {
        if (a.value != b.value) {
            return a.value - b.value;
        }
        return a.name < b.name ? -1 : (a.name > b.name ? 1 : 0);
    });

    for (const sym of sorted) {
        write(`${sym.name}\t${sym.value}\t${SymbolType[sym.type]}`);
    }
}
