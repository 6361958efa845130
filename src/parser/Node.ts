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

export enum NodeType {
    AddressLiteral,
    AddressSymbol,
    Compute,
    Label,
    Empty,
}

export type Statement = AddressLiteral | AddressSymbol | Compute | Label | Empty;

export interface BaseNode {
    type: NodeType;
}

// @123
export interface AddressLiteral extends BaseNode {
    type: NodeType.AddressLiteral;
    value: number;
}

// @LOOP
export interface AddressSymbol extends BaseNode {
    type: NodeType.AddressSymbol;
    name: string;
}

// dest=comp;jump
export interface Compute extends BaseNode {
    type: NodeType.Compute;
    dest?: string;
    comp: string;
    jump?: string;

    // unmatched rest of the line, kept to report it
    trailing: string;
}

// (LOOP)
export interface Label extends BaseNode {
    type: NodeType.Label;
    name: string;
}

export interface Empty extends BaseNode {
    type: NodeType.Empty;
}
