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

// computation: 111 prefix, a-bit, c1..c6
export const CompCodes: ReadonlyMap<string, string> = new Map([
    ["0",   "1110101010"],
    ["1",   "1110111111"],
    ["-1",  "1110111010"],
    ["D",   "1110001100"],
    ["A",   "1110110000"],
    ["!D",  "1110001101"],
    ["!A",  "1110110001"],
    ["-D",  "1110001111"],
    ["-A",  "1110110011"],
    ["D+1", "1110011111"],
    ["A+1", "1110110111"],
    ["D-1", "1110001110"],
    ["A-1", "1110110010"],
    ["D+A", "1110000010"],
    ["D-A", "1110010011"],
    ["A-D", "1110000111"],
    ["D&A", "1110000000"],
    ["D|A", "1110010101"],
    ["M",   "1111110000"],
    ["!M",  "1111110001"],
    ["-M",  "1111110011"],
    ["M+1", "1111110111"],
    ["M-1", "1111110010"],
    ["D+M", "1111000010"],
    ["D-M", "1111010011"],
    ["M-D", "1111000111"],
    ["D&M", "1111000000"],
    ["D|M", "1111010101"],
]);

export const DestCodes: ReadonlyMap<string, string> = new Map([
    ["M",   "001"],
    ["D",   "010"],
    ["MD",  "011"],
    ["A",   "100"],
    ["AM",  "101"],
    ["AD",  "110"],
    ["AMD", "111"],
]);

export const JumpCodes: ReadonlyMap<string, string> = new Map([
    ["JGT", "001"],
    ["JEQ", "010"],
    ["JGE", "011"],
    ["JLT", "100"],
    ["JNE", "101"],
    ["JLE", "110"],
    ["JMP", "111"],
]);

export const NoDest = "000";
export const NoJump = "000";

function longestFirst(symbols: Iterable<string>): readonly string[] {
    return [...symbols].sort((a, b) => b.length - a.length);
}

export const CompSymbols = longestFirst(CompCodes.keys());
export const DestSymbols = longestFirst(DestCodes.keys());
export const JumpSymbols = longestFirst(JumpCodes.keys());
