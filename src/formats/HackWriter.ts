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

import { isMachineWord } from "../utils/Strings.js";

export class HackWriter {
    private words: string[] = [];

    public writeWord(word: string): void {
        if (!isMachineWord(word)) {
            throw Error(`Invalid machine word ${word}`);
        }
        this.words.push(word);
    }

    public finish(): string {
        return this.words.map(w => w + "\n").join("");
    }
}
