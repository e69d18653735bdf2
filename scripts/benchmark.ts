import { promises as fs } from "node:fs";
import path from "node:path";
import { performance } from "node:perf_hooks";
import { HashingEmbeddingClient } from "../src/infra/ai/hashingEmbeddingClient.js";
import { ExactVectorIndex } from "../src/infra/store/exactVectorIndex.js";
import { splitIntoChunks } from "../src/pipelines/chunking.js";

interface BenchConfig {
  documents: number;
  sentencesPerDocument: number;
  queries: number;
  topK: number;
  dimension: number;
  saveResults: boolean;
  outputDir: string;
}

interface SummaryMetrics {
  runs: number;
  avgLatencyMs: number;
  p95LatencyMs: number;
}

interface BenchmarkReport {
  generatedAt: string;
  config: BenchConfig;
  indexing: { documents: number; chunks: number; totalMs: number };
  search: SummaryMetrics;
}

const WORDS = [
  "river", "engine", "harbor", "signal", "garden", "lattice", "copper", "meadow",
  "vector", "canyon", "lantern", "orbit", "ledger", "thunder", "pepper", "compass",
  "glacier", "ribbon", "quarry", "falcon", "timber", "socket", "marble", "nectar",
];

async function main() {
  const config = loadConfig();
  console.log("Benchmark config");
  console.log("================");
  console.log(JSON.stringify(config, null, 2));
  console.log("");

  const embedder = new HashingEmbeddingClient(config.dimension);
  const index = new ExactVectorIndex({ dimension: config.dimension });
  const random = seededRandom(42);

  let chunkCount = 0;
  const indexStartedAt = performance.now();
  for (let doc = 0; doc < config.documents; doc += 1) {
    const text = buildDocument(random, config.sentencesPerDocument);
    const spans = splitIntoChunks(text);
    const vectors = await embedder.embedTexts(spans.map((span) => span.text));
    const records = await index.replaceDocument(
      `bench://doc-${doc + 1}`,
      spans.map((span, position) => ({ ...span, vector: vectors[position] })),
    );
    chunkCount += records.length;
  }
  const indexingMs = performance.now() - indexStartedAt;

  const latencies: number[] = [];
  for (let i = 0; i < config.queries; i += 1) {
    const queryVector = await embedder.embedQuery(buildSentence(random));
    const startedAt = performance.now();
    await index.search(queryVector, config.topK);
    latencies.push(performance.now() - startedAt);
  }

  const report: BenchmarkReport = {
    generatedAt: new Date().toISOString(),
    config,
    indexing: { documents: config.documents, chunks: chunkCount, totalMs: round(indexingMs) },
    search: {
      runs: latencies.length,
      avgLatencyMs: round(average(latencies)),
      p95LatencyMs: round(percentile(latencies, 95)),
    },
  };

  console.log("Results");
  console.log("=======");
  console.log(JSON.stringify({ indexing: report.indexing, search: report.search }, null, 2));

  if (config.saveResults) {
    const absoluteDir = path.resolve(config.outputDir);
    await fs.mkdir(absoluteDir, { recursive: true });
    const jsonPath = path.join(absoluteDir, `benchmark-${report.generatedAt.replace(/[:.]/g, "-")}.json`);
    await fs.writeFile(jsonPath, JSON.stringify(report, null, 2), "utf-8");
    console.log(`\nSaved: ${jsonPath}`);
  }
}

function loadConfig(): BenchConfig {
  return {
    documents: Math.max(1, Number(process.env.BENCH_DOCUMENTS ?? "200")),
    sentencesPerDocument: Math.max(1, Number(process.env.BENCH_SENTENCES ?? "40")),
    queries: Math.max(1, Number(process.env.BENCH_QUERIES ?? "200")),
    topK: Math.max(1, Number(process.env.BENCH_TOP_K ?? "5")),
    dimension: Math.max(8, Number(process.env.BENCH_DIMENSION ?? "384")),
    saveResults: (process.env.BENCH_SAVE ?? "false").toLowerCase() === "true",
    outputDir: process.env.BENCH_OUTPUT_DIR ?? ".benchmarks",
  };
}

function buildDocument(random: () => number, sentences: number): string {
  const parts: string[] = [];
  for (let i = 0; i < sentences; i += 1) {
    parts.push(buildSentence(random));
  }
  return parts.join(" ");
}

function buildSentence(random: () => number): string {
  const length = 6 + Math.floor(random() * 8);
  const words: string[] = [];
  for (let i = 0; i < length; i += 1) {
    words.push(WORDS[Math.floor(random() * WORDS.length)]);
  }
  const sentence = words.join(" ");
  return `${sentence.charAt(0).toUpperCase()}${sentence.slice(1)}.`;
}

// mulberry32
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function round(value: number): number {
  return Number(value.toFixed(3));
}

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((acc, value) => acc + value, 0);
  return sum / values.length;
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length) - 1;
  const index = Math.min(sorted.length - 1, Math.max(0, rank));
  return sorted[index];
}

main().catch((error) => {
  console.error("Benchmark failed:", error);
  process.exit(1);
});
