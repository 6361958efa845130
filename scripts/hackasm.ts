#!/usr/bin/env node
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

import { command, flag, option, optional, positional, run, string } from "cmd-ts";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { basename } from "path";
import { HackAsm, HackAsmOptions } from "../src/HackAsm.js";
import { compareHack, formatDifference } from "../src/formats/compareHack.js";
import { HackReader } from "../src/formats/HackReader.js";
import { formatCodeError } from "../src/utils/CodeError.js";
import { checkInputFile, deriveListingPath, deriveOutputPath } from "../src/utils/Paths.js";

// eslint-disable-next-line max-lines-per-function
const cmd = command({
    name: "hackasm",
    description: "Assembler for the Hack 16-bit platform",
    args: {
        destination: option({
            long: "destination",
            short: "d",
            description: "Output directory, by default the directory of the source",
            type: optional(string),
        }),
        logFile: option({
            long: "log-file",
            short: "l",
            description: "Write errors to this file",
            type: string,
            defaultValue: () => "log.txt",
        }),
        writeSymbols: flag({
            long: "write-symbols",
            short: "s",
            description: "Write symbol table next to the output",
        }),
        noSymbols: flag({
            long: "no-symbols",
            description: "Assemble without a symbol table, only numeric addresses",
        }),
        compareWith: option({
            long: "compare",
            short: "c",
            description: "Compare output with given hack file",
            type: optional(string),
        }),
        source: positional({
            description: "Input source file",
            displayName: "source",
            type: string,
        }),
    },

    handler: (args) => {
        let inputProblem = checkInputFile(args.source, true);
        if (!inputProblem && args.compareWith) {
            inputProblem = checkInputFile(args.compareWith);
        }
        if (inputProblem) {
            console.error(inputProblem);
            process.exit(-1);
        }

        const opts: HackAsmOptions = {};
        opts.symbolicAddresses = !args.noSymbols;
        opts.listSymbols = args.writeSymbols;

        const src = readFileSync(args.source, "utf-8");
        const output = new HackAsm(opts).run(args.source, src);

        output.warnings.forEach(w => console.error(formatCodeError(w)));
        output.errors.forEach(e => console.error(formatCodeError(e)));
        if (output.errors.length > 0) {
            writeFileSync(args.logFile, output.errors.map(e => formatCodeError(e) + "\n").join(""));
        }

        // partial output is still written when some lines failed
        if (args.destination) {
            mkdirSync(args.destination, { recursive: true });
        }
        const outPath = deriveOutputPath(args.source, args.destination);
        writeFileSync(outPath, output.hack);
        console.log(`Wrote ${output.instructions.length} instructions to ${outPath}`);

        if (output.symbolListing !== undefined) {
            writeFileSync(deriveListingPath(outPath), output.symbolListing);
        }

        let good = output.errors.length == 0;
        if (args.compareWith) {
            const other = new HackReader(readFileSync(args.compareWith, "utf-8")).read();
            const name = basename(args.compareWith);
            const diffs = compareHack(output.instructions.map(inst => inst.binary), other);
            diffs.forEach(d => console.log(formatDifference(name, d)));
            if (diffs.length == 0) {
                console.log("No differences");
            } else {
                good = false;
            }
        }

        console.log("Assembly complete!");
        process.exit(good ? 0 : -1);
    }
});

void run(cmd, process.argv.slice(2));
