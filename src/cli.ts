#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { check, replay } from './core/router.js';
import { PayloadError } from './core/errorBuilder.js';
import type { OutputFormat } from './core/format.js';
import { textReport, toJsonResult } from './core/format.js';
import { consoleLogger, silentLogger } from './core/logger.js';
import { SessionRegistry } from './session/registry.js';
import type { StateMachine } from './session/state-machine.js';

function printUsage() {
    console.log('Usage: fsm-diagram render <input> [output]');
    console.log('       fsm-diagram check <input>');
    console.log('       cat log | fsm-diagram render - [output]');
    console.log('  - <input> is a machine description (.fsm.json) or a command log (.fsmlog)');
    console.log('  - A command log holds set-fsm/update-state commands written back to back;');
    console.log('    it is replayed and the final highlight state is rendered');
    console.log('  - When a directory is given, scans recursively for .fsm.json/.fsmlog files');
    console.log('Options:');
    console.log('  --output, -o    Output file (single session) or directory (several sessions)');
    console.log('  --client, -c    Client id used for the replay (default: input file name)');
    console.log('  --format, -f    Output format: svg|json (default: svg)');
    console.log('  --include, -I   Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
    console.log('  --verbose, -v   Log state changes while replaying');
}

type CliOptions = {
    format: OutputFormat;
    outputPath: string | null;
    clientId: string | null;
    includeGlobs: string[];
    excludeGlobs: string[];
    useGitignore: boolean;
    verbose: boolean;
    positionals: string[];
};

function parseArgs(args: string[]): CliOptions {
    const opts: CliOptions = {
        format: 'svg',
        outputPath: null,
        clientId: null,
        includeGlobs: [],
        excludeGlobs: [],
        useGitignore: true,
        verbose: false,
        positionals: [],
    };
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'svg' || v === 'json') { opts.format = v; i++; continue; }
        }
        if (a === '--output' || a === '-o') { opts.outputPath = args[i + 1] ?? null; i++; continue; }
        if (a === '--client' || a === '-c') { opts.clientId = args[i + 1] ?? null; i++; continue; }
        if (a === '--include' || a === '-I') {
            const v = args[i + 1];
            if (v) { opts.includeGlobs.push(...v.split(',').map(s => s.trim()).filter(Boolean)); i++; continue; }
        }
        if (a === '--exclude' || a === '-E') {
            const v = args[i + 1];
            if (v) { opts.excludeGlobs.push(...v.split(',').map(s => s.trim()).filter(Boolean)); i++; continue; }
        }
        if (a === '--no-gitignore') { opts.useGitignore = false; continue; }
        if (a === '--verbose' || a === '-v') { opts.verbose = true; continue; }
        if (a === '-' || !a.startsWith('-')) opts.positionals.push(a);
    }
    return opts;
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

const DEFAULT_INCLUDE_GLOBS = ['**/*.fsm.json', '**/*.fsmlog'];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/coverage/**'
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
      ...excludes,
      ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const files = await globby(patterns, {
      cwd: path.resolve(root),
      absolute: true,
      dot: true,
      gitignore: useGitignore,
      ignore,
      followSymbolicLinks: false,
    });
    return files.sort();
}

async function collectInputs(target: string, opts: CliOptions): Promise<Array<{ content: string; filename: string }>> {
    if (isDirectory(target)) {
        const files = await listCandidateFiles(target, opts.includeGlobs, opts.excludeGlobs, opts.useGitignore);
        return files.map(file => ({ content: fs.readFileSync(file, 'utf8'), filename: file }));
    }
    return [readInput(target)];
}

function baseName(filename: string): string {
    if (filename === '<stdin>') return 'stdin';
    return path.basename(filename).replace(/\.fsm\.json$|\.fsmlog$|\.json$/i, '');
}

function safeFileName(text: string): string {
    return text.replace(/[^A-Za-z0-9._-]+/g, '_') || 'fsm';
}

function writeSvgs(machines: StateMachine[], opts: CliOptions, source: string) {
    const withDiagram = machines.filter(m => m.currentDiagram !== null);
    if (withDiagram.length === 0) {
        console.error(`No machine description found in ${source}`);
        return false;
    }
    const single = withDiagram.length === 1;
    const outDir = opts.outputPath && !single ? opts.outputPath : '.';
    if (!single) fs.mkdirSync(outDir, { recursive: true });
    for (const machine of withDiagram) {
        const svg = machine.toSvg();
        if (svg === undefined) continue;
        const target = single && opts.outputPath
            ? opts.outputPath
            : path.join(outDir, `${safeFileName(machine.clientId)}-${safeFileName(machine.fsmName)}.svg`);
        fs.writeFileSync(target, svg, 'utf8');
        console.log(`✅ Rendered ${machine.key}: ${target}`);
    }
    return true;
}

async function handleRenderCommand(args: string[]) {
    const opts = parseArgs(args);
    const target = opts.positionals[0];
    if (!target) {
        console.error('Error: No input file specified');
        process.exit(1);
    }
    if (!opts.outputPath && opts.positionals[1]) opts.outputPath = opts.positionals[1];

    const registry = new SessionRegistry({ logger: opts.verbose ? consoleLogger : silentLogger });
    const inputs = await collectInputs(target, opts);
    let failed = false;
    for (const { content, filename } of inputs) {
        try {
            replay(content, opts.clientId ?? baseName(filename), registry);
        } catch (error) {
            if (!(error instanceof PayloadError)) throw error;
            console.error(textReport(filename, error.issues).trimEnd());
            failed = true;
        }
    }

    const machines = registry.sessions();
    if (opts.format === 'json') {
        const summary = machines.map(m => {
            const diagram = m.currentDiagram;
            return {
                key: m.key,
                clientId: m.clientId,
                fsm: m.fsmName,
                width: diagram?.totalWidth ?? 0,
                height: diagram?.totalHeight ?? 0,
                highlighted: diagram ? diagram.nodes().filter(n => n.appearance === 'highlighted').map(n => n.id) : [],
            };
        });
        console.log(JSON.stringify({ valid: !failed, sessions: summary }, null, 2));
    } else if (!writeSvgs(machines, opts, target)) {
        failed = true;
    }
    process.exit(failed ? 1 : 0);
}

async function handleCheckCommand(args: string[]) {
    const opts = parseArgs(args);
    const target = opts.positionals[0];
    if (!target) {
        console.error('Error: No input file specified');
        process.exit(1);
    }
    const inputs = await collectInputs(target, opts);
    const results = inputs.map(({ content, filename }) => ({ filename, ...check(content) }));
    const invalid = results.filter(r => r.issues.length > 0);
    if (opts.format === 'json') {
        const files = results.map(r => toJsonResult(r.filename, r.issues));
        console.log(JSON.stringify({ valid: invalid.length === 0, files }, null, 2));
    } else if (invalid.length === 0) {
        console.log(results.length === 0 ? 'No machine descriptions found.' : 'All inputs valid.');
    } else {
        for (const r of invalid) console.error(textReport(r.filename, r.issues).trimEnd());
    }
    process.exit(invalid.length > 0 ? 1 : 0);
}

async function main() {
    const args = process.argv.slice(2);
    const [command, ...rest] = args;

    if (command === 'render') {
        if (rest.length === 0 || rest[0] === '--help' || rest[0] === '-h') {
            printUsage();
            process.exit(rest.length === 0 ? 1 : 0);
        }
        await handleRenderCommand(rest);
        return;
    }
    if (command === 'check') {
        await handleCheckCommand(rest);
        return;
    }

    printUsage();
    process.exit(command === '-h' || command === '--help' ? 0 : 1);
}

main().catch((err) => {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
});
