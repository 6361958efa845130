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

import { isLabelDeclaration } from "../lexer/Sanitizer.js";
import { isDecimal } from "../utils/Strings.js";
import { CompSymbols, DestSymbols, JumpSymbols } from "./Encodings.js";
import * as Nodes from "./Node.js";
import { NodeType } from "./Node.js";

/**
 * Classifies a sanitized line. Address syntax wins over compute syntax,
 * compute syntax over label declarations.
 *
 * @returns undefined if the line has no valid shape
 */
export function parseLine(line: string): Nodes.Statement | undefined {
    if (line.startsWith("@")) {
        return parseAddress(line.substring(1));
    }

    const compute = matchCompute(line);
    if (compute) {
        return compute;
    }

    if (isLabelDeclaration(line)) {
        return {
            type: NodeType.Label,
            name: line.substring(1, line.length - 1),
        };
    }

    if (line.length == 0) {
        return { type: NodeType.Empty };
    }

    return undefined;
}

// an empty operand is a symbol like any other non-decimal operand
function parseAddress(operand: string): Nodes.AddressLiteral | Nodes.AddressSymbol {
    if (isDecimal(operand)) {
        return {
            type: NodeType.AddressLiteral,
            value: Number.parseInt(operand, 10),
        };
    }

    return {
        type: NodeType.AddressSymbol,
        name: operand,
    };
}

/**
 * Matches `[dest=]comp[;jump]` at the start of the line. Each part takes the
 * longest token that fits and is never revisited. Text after the last
 * matched part is returned as `trailing` instead of failing the match.
 *
 * @returns undefined if no computation could be matched
 */
export function matchCompute(line: string): Nodes.Compute | undefined {
    let pos = 0;

    let dest: string | undefined;
    const destSym = matchToken(line, pos, DestSymbols);
    if (destSym !== undefined && line[pos + destSym.length] == "=") {
        dest = destSym;
        pos += destSym.length + 1;
    }

    const comp = matchToken(line, pos, CompSymbols);
    if (comp === undefined) {
        return undefined;
    }
    pos += comp.length;

    let jump: string | undefined;
    if (line[pos] == ";") {
        jump = matchToken(line, pos + 1, JumpSymbols);
        if (jump !== undefined) {
            pos += jump.length + 1;
        }
    }

    return {
        type: NodeType.Compute,
        dest,
        comp,
        jump,
        trailing: line.substring(pos),
    };
}

function matchToken(line: string, pos: number, symbols: readonly string[]): string | undefined {
    return symbols.find(sym => line.startsWith(sym, pos));
}
