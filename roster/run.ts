#!/usr/bin/env node
import "dotenv/config";
import { convertTableToAmc, convertToAmc, convertToVcards, dumpNdjson, exportPhotos } from "./commands.js";

const OUTDIR = process.env.ROSTER_OUTDIR ?? "./data/roster";

const args = process.argv.slice(3);
const flag = (name: string) => args.includes(`--${name}`);
const option = (name: string) => args.find(a => a.startsWith(`--${name}=`))?.slice(name.length + 3);
const positional = args.filter(a => !a.startsWith("--"));

const infile = positional[0] ?? "Access Class Rosters.html";
const direct = flag("direct");

const commands: Record<string, () => Promise<void>> = {
  vcard: async () => {
    convertToVcards({
      infile,
      direct,
      save: flag("save"),
      saveDir: option("save-dir") ?? process.cwd(),
      print: !flag("no-print"),
    });
  },
  photos: async () => {
    exportPhotos({ infile, direct, saveDir: option("save-dir") ?? process.cwd() });
  },
  ndjson: async () => dumpNdjson({ infile, direct, outdir: option("outdir") ?? OUTDIR }),
  amc: async () => convertToAmc({ infile, direct, output: option("output") }),
  xls2amc: async () => convertTableToAmc({ infile: positional[0] ?? "ps.xls", output: option("output") }),
};

const target = process.argv[2];
if (!target || !commands[target]) {
  console.error("Usage: roster <vcard|photos|ndjson|amc|xls2amc> [FILE] [--direct] [--save] [--save-dir=DIR] [--no-print] [--outdir=DIR] [--output=FILE]");
  process.exit(1);
}
commands[target]().catch(err => {
  console.error(err);
  process.exit(1);
});
