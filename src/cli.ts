#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import type { z } from 'zod';
import type { Graph } from './model/graph.js';
import type { GraphStatistics } from './model/types.js';
import type { GraphIssue } from './core/types.js';
import { parseArgs, type ParsedArgs } from './core/args.js';
import { parseGraphJson, toRecords } from './core/records.js';
import { ALGORITHMS, detectAlgorithm, runAlgorithm } from './core/router.js';
import { issuesReport, statisticsReport, textReport, toJsonResult } from './core/format.js';
import { formatAdjacencyList, formatAdjacencyMatrix } from './core/adjacency.js';
import { generateSampleGraph } from './core/sample.js';
import { ForceDirectedLayout } from './layout/force-directed.js';
import {
    ExportFlagsSchema,
    LayoutFlagsSchema,
    RunFlagsSchema,
    SampleFlagsSchema,
    StatsFlagsSchema,
} from './core/schema.js';

function printUsage() {
    console.log('Usage: sociograph <graph.json|directory>');
    console.log('       sociograph run <graph.json> <algorithm> [options]');
    console.log('       sociograph layout <graph.json> [out.json] [options]');
    console.log('       sociograph sample <count> [options]');
    console.log('       sociograph export <graph.json> --as list|matrix');
    console.log('  - Prints graph statistics for a file, or for every *.graph.json under a directory');
    console.log('  - Use "-" to read graph JSON from stdin');
    console.log('Algorithms:');
    for (const [name, info] of Object.entries(ALGORITHMS)) {
        console.log(`  ${name.padEnd(12)} ${info.description}`);
    }
    console.log('Options:');
    console.log('  --start <id>             Start node (bfs, dfs, dijkstra, astar)');
    console.log('  --target <id>            Target node (dijkstra, astar)');
    console.log('  --top-k <k>              Top nodes highlighted by centrality (default: 5)');
    console.log('  --heuristic-scale <s>    A* heuristic multiplier (default: 0.01)');
    console.log('  --format, -f             Output format: text|json (default: text)');
    console.log('  --iterations <n>         Layout steps (default: 150)');
    console.log('  --repulsion, --attraction, --damping   Layout forces');
    console.log('  --probability <p>        Edge probability for sample graphs (default: 0.3)');
    console.log('  --output, -o             Output file (sample)');
}

function parseArgsOrExit(args: string[]): ParsedArgs {
    const parsed = parseArgs(args);
    if (!parsed.ok) {
        console.error(parsed.message);
        process.exit(1);
    }
    return parsed.value;
}

function parseFlags<T extends z.ZodTypeAny>(schema: T, flags: Record<string, unknown>): z.output<T> {
    const parsed = schema.safeParse(flags);
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            const flag = String(issue.path[0] ?? '').replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
            console.error(`Invalid option --${flag}: ${issue.message}`);
        }
        process.exit(1);
    }
    return parsed.data;
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

function loadGraph(arg: string | undefined): Graph {
    if (!arg) {
        console.error('Error: No input file specified');
        process.exit(1);
    }
    const { content, filename } = readInput(arg);
    const { graph, issues } = parseGraphJson(content);
    if (issues.length > 0) console.error(issuesReport(filename, issues));
    if (!graph) process.exit(1);
    return graph;
}

function writeOutput(file: string | undefined, text: string, what: string) {
    if (!file) {
        console.log(text);
        return;
    }
    fs.writeFileSync(file, text + '\n', 'utf8');
    console.log(`✅ ${what} written to ${file}`);
}

const DEFAULT_IGNORE_DIRS = [
    '**/.git/**',
    '**/node_modules/**',
    '**/dist/**',
    '**/coverage/**',
];

async function listGraphFiles(root: string): Promise<string[]> {
    const files = await globby(['**/*.graph.json'], {
        cwd: path.resolve(root),
        absolute: true,
        gitignore: true,
        ignore: DEFAULT_IGNORE_DIRS,
        followSymbolicLinks: false,
    });
    return files.sort();
}

function handleRun(args: string[]) {
    const { positionals, flags } = parseArgsOrExit(args);
    const [file, name] = positionals;
    if (!name) {
        console.error('Usage: sociograph run <graph.json> <algorithm> [options]');
        process.exit(1);
    }
    const algorithm = detectAlgorithm(name);
    if (!algorithm) {
        console.error(`Unknown algorithm: ${name}`);
        console.error(`Available: ${Object.keys(ALGORITHMS).join(', ')}`);
        process.exit(1);
    }
    const opts = parseFlags(RunFlagsSchema, flags);
    const graph = loadGraph(file);

    const result = runAlgorithm(graph, {
        algorithm,
        startId: opts.start,
        targetId: opts.target,
        topK: opts.topK,
        heuristicScale: opts.heuristicScale,
    });

    if (opts.format === 'json') {
        console.log(JSON.stringify(toJsonResult(result), null, 2));
    } else if (result.success) {
        console.log(textReport(result));
    } else {
        console.error(textReport(result));
    }
    process.exit(result.success ? 0 : 1);
}

function handleLayout(args: string[]) {
    const { positionals, flags } = parseArgsOrExit(args);
    const opts = parseFlags(LayoutFlagsSchema, flags);
    const graph = loadGraph(positionals[0]);

    const engine = new ForceDirectedLayout(opts);
    const summary = engine.layout(graph);
    console.error(`Layout: ${summary.iterations} iterations, last step moved ${summary.maxDisplacement.toFixed(2)}`);
    writeOutput(positionals[1], JSON.stringify(toRecords(graph), null, 2), 'Layout');
}

function handleSample(args: string[]) {
    const { positionals, flags } = parseArgsOrExit(args);
    const opts = parseFlags(SampleFlagsSchema, { ...flags, count: positionals[0] });
    const graph = generateSampleGraph(opts.count, opts.probability);
    writeOutput(opts.output, JSON.stringify(toRecords(graph), null, 2), `Sample graph (${graph.nodeCount} nodes, ${graph.edgeCount} edges)`);
}

function handleExport(args: string[]) {
    const { positionals, flags } = parseArgsOrExit(args);
    const opts = parseFlags(ExportFlagsSchema, flags);
    const graph = loadGraph(positionals[0]);
    console.log(opts.as === 'matrix' ? formatAdjacencyMatrix(graph) : formatAdjacencyList(graph));
}

async function handleStatistics(args: string[]) {
    const { positionals, flags } = parseArgsOrExit(args);
    const opts = parseFlags(StatsFlagsSchema, flags);
    const target = positionals[0];
    if (!target) {
        printUsage();
        process.exit(1);
    }

    const files = isDirectory(target) ? await listGraphFiles(target) : [target];
    if (files.length === 0) {
        console.log('No *.graph.json files found.');
        process.exit(0);
    }

    let failed = false;
    const json: Array<{ file: string; valid: boolean; statistics: GraphStatistics | null; issues: GraphIssue[] }> = [];
    for (const file of files) {
        const { content, filename } = readInput(file);
        const { graph, issues } = parseGraphJson(content);
        const valid = graph !== null && !issues.some((i) => i.severity === 'error');
        if (!valid) failed = true;
        if (opts.format === 'json') {
            json.push({ file: filename, valid, statistics: graph ? graph.getStatistics() : null, issues });
            continue;
        }
        if (issues.length > 0) console.error(issuesReport(filename, issues));
        if (graph) console.log(statisticsReport(filename, graph.getStatistics()));
    }

    if (opts.format === 'json') {
        console.log(JSON.stringify({ valid: !failed, files: json }, null, 2));
    }
    process.exit(failed ? 1 : 0);
}

async function main() {
    const args = process.argv.slice(2);

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    switch (args[0]) {
        case 'run': return handleRun(args.slice(1));
        case 'layout': return handleLayout(args.slice(1));
        case 'sample': return handleSample(args.slice(1));
        case 'export': return handleExport(args.slice(1));
        default: return handleStatistics(args);
    }
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
});
