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

export interface HackDifference {
    index: number;
    ours?: string;
    other?: string;
}

export function compareHack(ours: readonly string[], other: readonly string[]): HackDifference[] {
    const diffs: HackDifference[] = [];
    const len = Math.max(ours.length, other.length);

    for (let i = 0; i < len; i++) {
        if (ours[i] !== other[i]) {
            diffs.push({ index: i, ours: ours[i], other: other[i] });
        }
    }

    return diffs;
}

export function formatDifference(name: string, diff: HackDifference): string {
    return `${diff.index}: our ${diff.ours ?? "null"} != other ${diff.other ?? "null"} in ${name}`;
}
