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

import { SourceLine } from "../lexer/SourceLine.js";
import { ParseError } from "../parser/ParseError.js";

export enum InstructionType {
    Address,
    Compute,
}

export interface ParsedInstruction {
    readonly type: InstructionType;
    readonly binary: string;
    readonly source: SourceLine;
}

export enum ResultType {
    Instruction,    // line produced a machine word
    Skip,           // empty or label declaration, produces nothing
    Error,
}

export type ParseResult = InstructionResult | SkipResult | ErrorResult;

export interface InstructionResult {
    type: ResultType.Instruction;
    instruction: ParsedInstruction;
    warning?: ParseError;
}

export interface SkipResult {
    type: ResultType.Skip;
}

export interface ErrorResult {
    type: ResultType.Error;
    error: ParseError;
}
