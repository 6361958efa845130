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

export * from "./HackAsm.js";
export * from "./lexer/Sanitizer.js";
export * from "./lexer/SourceLine.js";
export * from "./parser/Node.js";
export * from "./parser/LineParser.js";
export * from "./parser/ParseError.js";
export * from "./assembler/Assembler.js";
export * from "./assembler/Instruction.js";
export * from "./assembler/InstructionEncoder.js";
export * from "./assembler/SymbolData.js";
export * from "./assembler/SymbolTable.js";
export * from "./formats/HackReader.js";
export * from "./formats/HackWriter.js";
export * from "./formats/compareHack.js";
export * from "./formats/dumpSymbols.js";
export * from "./utils/CodeError.js";
export * from "./utils/Paths.js";
