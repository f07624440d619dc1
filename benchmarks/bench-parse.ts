import { parse } from "../src/parser/parser.js";
import { format } from "../src/format/formatter.js";
import { get } from "../src/lookup/lookup.js";

const buildDocument = (records: number): string => {
  const items: string[] = [];
  for (let i = 0; i < records; i++) {
    items.push(
      `{"id":${i},"name":"record-${i}","score":${(i * 0.37).toFixed(2)},` +
        `"active":${i % 2 === 0},"tags":["t${i % 7}","t${i % 11}"],"parent":null}`
    );
  }
  return `{"records":[${items.join(",")}],"needle":"found"}`;
};

async function main() {
  const records = 50_000;
  const payload = Buffer.from(buildDocument(records), "utf8");
  console.log(`Starting benchmark with ${records} records (${payload.length} bytes)...`);

  const parseStart = process.hrtime.bigint();
  const root = parse(payload);
  const parseEnd = process.hrtime.bigint();

  const text = format(root);
  const formatEnd = process.hrtime.bigint();

  const found = get(root, "needle");
  const lookupEnd = process.hrtime.bigint();

  const seconds = (from: bigint, to: bigint) => Number(to - from) / 1e9;
  const parseSeconds = seconds(parseStart, parseEnd);
  console.log(`Parsed in ${parseSeconds.toFixed(3)}s`);
  console.log(`Throughput: ${(payload.length / parseSeconds / 1024 / 1024).toFixed(2)} MiB/s`);
  console.log(`Formatted ${text.length} chars in ${seconds(parseEnd, formatEnd).toFixed(3)}s`);
  console.log(`Lookup (type ${found.type}) in ${seconds(formatEnd, lookupEnd).toFixed(3)}s`);
}

main().catch(console.error);
