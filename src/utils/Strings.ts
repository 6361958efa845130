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

import { WordWidth } from "./Hack.js";

const MachineWordRegex = new RegExp(`^[01]{${WordWidth}}$`);

export function numToBinary(num: number, width: number): string {
    return num.toString(2).padStart(width, "0");
}

export function toMachineWord(num: number): string {
    return numToBinary(num, WordWidth);
}

export function isMachineWord(str: string): boolean {
    return MachineWordRegex.test(str);
}

export function isDecimal(str: string): boolean {
    return /^[0-9]+$/.test(str);
}
