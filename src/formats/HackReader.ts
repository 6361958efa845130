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

export class HackFormatError extends Error {
    public line: number;

    public constructor(msg: string, line: number) {
        super(msg);
        this.name = HackFormatError.name;
        this.line = line;
    }
}

export class HackReader {
    private text: string;

    public constructor(text: string) {
        this.text = text;
    }

    /**
     * @returns the machine words in file order, blank lines skipped
     * @throws HackFormatError on a line that is not a 16 digit binary word
     */
    public read(): string[] {
        const words: string[] = [];
        this.text.split(/\r?\n/).forEach((raw, idx) => {
            const line = raw.trim();
            if (line.length == 0) {
                return;
            }
            if (!isMachineWord(line)) {
                throw new HackFormatError(`Invalid machine word in line ${idx + 1}: ${line}`, idx + 1);
            }
            words.push(line);
        });
        return words;
    }
}
