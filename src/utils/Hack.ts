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

export const WordWidth = 16;
export const NumRegisters = 16;

// allocated addresses keep the top bit clear, literals may use all 16 bits
export const MaxAddress = 0x7FFF;
export const MaxWord = 0xFFFF;
export const FirstVariableAddress = 16;

export const ScreenAddr = 0x4000;
export const KbdAddr = 0x6000;

export const ReservedSymbols: ReadonlyArray<readonly [string, number]> = [
    ["SP", 0],
    ["LCL", 1],
    ["ARG", 2],
    ["THIS", 3],
    ["THAT", 4],
    ["SCREEN", ScreenAddr],
    ["KBD", KbdAddr],
];

export function registerName(num: number): string {
    return `R${num}`;
}

export function isAddressInRange(addr: number): boolean {
    return addr >= 0 && addr <= MaxAddress;
}

export function isWordInRange(value: number): boolean {
    return value >= 0 && value <= MaxWord;
}
