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

import { sanitizeLine } from "../lexer/Sanitizer.js";
import { SourceLine } from "../lexer/SourceLine.js";
import { CompCodes, DestCodes, JumpCodes, NoDest, NoJump } from "../parser/Encodings.js";
import { parseLine } from "../parser/LineParser.js";
import * as Nodes from "../parser/Node.js";
import { NodeType } from "../parser/Node.js";
import { ParseError, ParseErrorKind } from "../parser/ParseError.js";
import { isAddressInRange, isWordInRange } from "../utils/Hack.js";
import { toMachineWord } from "../utils/Strings.js";
import { InstructionResult, InstructionType, ParseResult, ResultType } from "./Instruction.js";
import { SymbolResolver } from "./SymbolData.js";

/**
 * Encodes a single instruction line. Symbolic addresses are resolved through
 * `symbols`, which may allocate new variables; without it they are an error.
 * Failures are returned, never thrown.
 */
export function parseInstruction(source: SourceLine, symbols?: SymbolResolver): ParseResult {
    const line = { ...source, text: sanitizeLine(source.text) };
    const stmt = parseLine(line.text);
    if (!stmt) {
        return mkError(ParseErrorKind.UnknownInstruction, line);
    }

    switch (stmt.type) {
        case NodeType.AddressLiteral:
            return encodeAddress(line, stmt.value, isWordInRange);
        case NodeType.AddressSymbol:
            if (!symbols) {
                return mkError(ParseErrorKind.MissingSymbolTable, line);
            }
            return encodeAddress(line, symbols.resolveValue(stmt.name), isAddressInRange);
        case NodeType.Compute:
            return encodeCompute(line, stmt);
        case NodeType.Label:
        case NodeType.Empty:
            return { type: ResultType.Skip };
    }
}

function encodeAddress(line: SourceLine, addr: number, inRange: (addr: number) => boolean): ParseResult {
    if (!inRange(addr)) {
        return mkError(ParseErrorKind.AddressOutOfRange, line);
    }

    return {
        type: ResultType.Instruction,
        instruction: {
            type: InstructionType.Address,
            binary: toMachineWord(addr),
            source: line,
        },
    };
}

function encodeCompute(line: SourceLine, stmt: Nodes.Compute): ParseResult {
    const comp = lookupCode(CompCodes, stmt.comp);
    const dest = stmt.dest !== undefined ? lookupCode(DestCodes, stmt.dest) : NoDest;
    const jump = stmt.jump !== undefined ? lookupCode(JumpCodes, stmt.jump) : NoJump;

    const result: InstructionResult = {
        type: ResultType.Instruction,
        instruction: {
            type: InstructionType.Compute,
            binary: comp + dest + jump,
            source: line,
        },
    };

    if (stmt.trailing.length > 0) {
        result.warning = new ParseError(ParseErrorKind.TrailingText, line);
    }

    return result;
}

function lookupCode(table: ReadonlyMap<string, string>, sym: string): string {
    const code = table.get(sym);
    if (code === undefined) {
        throw Error(`No encoding for ${sym}`);
    }
    return code;
}

function mkError(kind: ParseErrorKind, line: SourceLine): ParseResult {
    return {
        type: ResultType.Error,
        error: new ParseError(kind, line),
    };
}
