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

const CommentMarker = "//";

/**
 * Reduces a raw source line to its significant characters: the comment starting
 * at the first `//` is dropped, then every whitespace character is removed.
 * The result may be empty.
 */
export function sanitizeLine(line: string): string {
    const commentIdx = line.indexOf(CommentMarker);
    const code = commentIdx >= 0 ? line.substring(0, commentIdx) : line;
    return code.replace(/\s/g, "");
}

export function isLabelDeclaration(line: string): boolean {
    return line.startsWith("(") && line.endsWith(")");
}
