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
import { CodeError, Severity } from "../utils/CodeError.js";

export enum ParseErrorKind {
    UnknownInstruction,     // neither address nor compute
    MissingSymbolTable,     // symbolic address without a table to resolve it
    AddressOutOfRange,      // value does not fit into an address instruction
    TrailingText,           // compute instruction followed by ignored text
}

const Descriptions: Record<ParseErrorKind, string> = {
    [ParseErrorKind.UnknownInstruction]: "Error parsing",
    [ParseErrorKind.MissingSymbolTable]: "Unresolvable symbol in",
    [ParseErrorKind.AddressOutOfRange]: "Address out of range in",
    [ParseErrorKind.TrailingText]: "Trailing text ignored in",
};

export class ParseError extends CodeError {
    public kind: ParseErrorKind;
    public text: string;
    public loc: number;

    public constructor(kind: ParseErrorKind, source: SourceLine) {
        const severity = kind == ParseErrorKind.TrailingText ? Severity.Warning : Severity.Error;
        super(`${Descriptions[kind]} ${source.loc}: ${source.text}`, source.inputName, source.lineNum, severity);
        this.name = ParseError.name;

        this.kind = kind;
        this.text = source.text;
        this.loc = source.loc;
    }
}
