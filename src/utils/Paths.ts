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

import { existsSync } from "fs";
import { basename, dirname, extname, join } from "path";

export const SourceExt = ".asm";
export const OutputExt = ".hack";
export const ListingExt = ".sym.txt";

export function isSourceFile(path: string): boolean {
    return extname(path) == SourceExt;
}

/**
 * @returns a message for the user if the file can't be used as input
 */
export function checkInputFile(path: string, requireSource = false): string | undefined {
    if (requireSource && !isSourceFile(path)) {
        return `Not an asm-file: ${path}`;
    }
    if (!existsSync(path)) {
        return `No such file: ${path}`;
    }
    return undefined;
}

/**
 * Output goes next to the source unless a destination directory is given.
 */
export function deriveOutputPath(source: string, destination?: string): string {
    const name = basename(source, extname(source)) + OutputExt;
    return join(destination ?? dirname(source), name);
}

export function deriveListingPath(output: string): string {
    return join(dirname(output), basename(output, OutputExt) + ListingExt);
}
