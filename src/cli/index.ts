#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Argument, Command, Option } from 'commander';
import { resolveConfig, type CliConfigFlags } from '../utils/config.js';
import { initLogger, getLogger, isLogLevel } from '../utils/logger.js';
import { CuneibibError } from '../utils/errors.js';
import { parseIdArgument } from './arguments.js';
import { CuneibibDatabase } from '../storage/database.js';
import { ingestBatch } from '../matching/dedup-policy.js';
import { DEFAULT_CURATION_PATH, loadCurationFile, seedSupersessions } from '../supersession/seed.js';
import { computeCurrentEditions } from '../supersession/current-edition.js';
import { runReleaseGate, VERIFIERS, isVerifierName } from '../verify/gate.js';
import { loadScholarCollisionGroups, planScholarMerges } from '../verify/scholars.js';
import type { CuneibibConfig, DedupResolution } from '../types/index.js';

const VERSION = '0.1.0';

interface CommonOptions {
    db?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

const program = new Command();

program
    .name('cuneibib')
    .description('Publication matching, deduplication and edition supersession for a cuneiform bibliography.')
    .version(VERSION);

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'SQLite database path')
        .addOption(new Option('--log-level <level>', 'Log level').choices(['silent', 'error', 'warn', 'info', 'debug']))
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Resolve configuration, open the database, run the command and close the
 * database again. Errors are logged and turn into exit code 1.
 */
async function run(opts: CommonOptions, fn: (db: CuneibibDatabase, config: CuneibibConfig) => boolean | void): Promise<void> {
    const flags: CliConfigFlags = {
        db: opts.db,
        logLevel: isLogLevel(opts.logLevel) ? opts.logLevel : undefined,
        jsonLogs: opts.jsonLogs,
    };

    let db: CuneibibDatabase | undefined;
    try {
        const config = await resolveConfig(flags);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        db = new CuneibibDatabase(config.db);
        if (fn(db, config) === false) {
            process.exitCode = 1;
        }
    } catch (error) {
        const logger = getLogger();
        if (error instanceof CuneibibError) logger.error({ err: error }, error.message);
        else logger.error({ err: error }, 'Command failed');
        process.exitCode = 1;
    } finally {
        db?.close();
    }
}

function isDedupResolution(value: string): value is DedupResolution {
    return value === 'same' || value === 'distinct';
}

function readRecords(path: string): unknown[] {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!Array.isArray(parsed)) {
        throw new CuneibibError(`Expected a JSON array of records in ${path}`);
    }
    return parsed;
}

// ─── INGEST command ───────────────────────────────────────

withCommonOptions(
    program
        .command('ingest')
        .description('Match, merge or insert candidate publications from a JSON array')
        .requiredOption('-i, --input <path>', 'Records file')
        .option('-s, --source <source>', 'Source tag for records without one', 'import')
).action(async (opts: CommonOptions & { input: string; source: string }) => {
    await run(opts, (db, config) => {
        const summary = ingestBatch(db, readRecords(opts.input), {
            matcher: config.matcher,
            policy: config.policy,
            defaultSource: opts.source,
        });
        console.log(
            `Ingested ${summary.total} record(s): ${summary.merged} merged, ${summary.inserted} inserted, ` +
                `${summary.review} for review, ${summary.unchanged} unchanged, ${summary.rejected} rejected`
        );
        for (const rejection of summary.rejections) {
            console.log(`  #${rejection.index}: ${rejection.error}`);
        }
    });
});

// ─── SEED-SUPERSESSIONS command ───────────────────────────

withCommonOptions(
    program
        .command('seed-supersessions')
        .description('Apply the curated publication supersession list')
        .option('-c, --curation <path>', 'Curation file', DEFAULT_CURATION_PATH)
).action(async (opts: CommonOptions & { curation: string }) => {
    await run(opts, (db, config) => {
        const report = seedSupersessions(db, loadCurationFile(opts.curation), {
            maxChainDepth: config.verify.maxChainDepth,
        });
        console.log(`Seeded ${report.seeded.length}, skipped ${report.skipped.length}, ignored ${report.ignored}`);
        for (const skip of report.skipped) {
            console.log(`  ${skip.current} → ${skip.supersedes}: ${skip.reason}`);
        }
        for (const violation of report.violations) {
            console.log(`  chain from ${violation.start}: ${violation.kind} (${violation.path.join(' → ')})`);
        }
        return report.violations.length === 0;
    });
});

// ─── CURRENT-EDITIONS command ─────────────────────────────

withCommonOptions(
    program.command('current-editions').description('Recompute the current edition of every artifact')
).action(async (opts: CommonOptions) => {
    await run(opts, (db) => {
        const report = computeCurrentEditions(db);
        console.log(`${report.artifacts} artifact(s): ${report.updated} updated, ${report.unchanged} unchanged`);
    });
});

// ─── VERIFY command ───────────────────────────────────────

withCommonOptions(
    program
        .command('verify')
        .description('Run the verifiers; exits 1 when the release gate fails')
        .addOption(new Option('--only <verifiers...>', 'Verifiers to run').choices([...VERIFIERS]))
).action(async (opts: CommonOptions & { only?: string[] }) => {
    await run(opts, (db, config) => {
        const result = runReleaseGate(db, {
            only: (opts.only ?? []).filter(isVerifierName),
            verify: config.verify,
        });

        for (const report of result.reports) {
            console.log(`\n${report.name}`);
            for (const check of report.checks) {
                console.log(`  [${check.status.toUpperCase()}] ${check.name}: ${check.detail}`);
            }
        }
        console.log(result.passed ? '\nRelease gate: PASS' : `\nRelease gate: FAIL (${result.failed.join(', ')})`);
        return result.passed;
    });
});

// ─── DEDUP command ────────────────────────────────────────

const dedup = program.command('dedup').description('Review potential duplicate publications');

withCommonOptions(
    dedup.command('list').description('List dedup candidates').option('-a, --all', 'Include resolved candidates')
).action(async (opts: CommonOptions & { all?: boolean }) => {
    await run(opts, (db) => {
        const candidates = db.getDedupCandidates(opts.all ? {} : { resolved: false });
        if (candidates.length === 0) {
            console.log('No dedup candidates.');
            return;
        }
        for (const c of candidates) {
            const state = c.resolved ? c.resolution ?? 'resolved' : 'pending';
            console.log(`  #${c.id}  ${c.pub_a_id} ↔ ${c.pub_b_id}  ${c.match_method} ${c.confidence.toFixed(2)}  ${state}`);
        }
    });
});

withCommonOptions(
    dedup
        .command('resolve')
        .description('Resolve a dedup candidate')
        .argument('<id>', 'Candidate id')
        .addArgument(new Argument('<resolution>', 'same | distinct').choices(['same', 'distinct']))
).action(async (id: string, resolution: string, opts: CommonOptions) => {
    await run(opts, (db) => {
        if (!isDedupResolution(resolution)) {
            throw new CuneibibError(`Unknown resolution: ${resolution}`);
        }
        const candidateId = parseIdArgument(id, 'candidate id');
        if (!db.resolveDedupCandidate(candidateId, resolution)) {
            throw new CuneibibError(`No pending dedup candidate with id ${id}`);
        }
        console.log(`Candidate ${candidateId} resolved as ${resolution}`);
    });
});

// ─── SCHOLARS command ─────────────────────────────────────

const scholars = program.command('scholars').description('Scholar name maintenance');

withCommonOptions(scholars.command('plan').description('Propose merges of scholars sharing a normalized name')).action(
    async (opts: CommonOptions) => {
        await run(opts, (db) => {
            const plan = planScholarMerges(loadScholarCollisionGroups(db));
            console.log(`${plan.merges.length} merge(s), ${plan.review.length} for review`);
            for (const pair of plan.merges) {
                console.log(`  merge   "${pair.drop.name}" (#${pair.drop.id}) into "${pair.keep.name}" (#${pair.keep.id})`);
            }
            for (const pair of plan.review) {
                console.log(`  review  "${pair.drop.name}" (#${pair.drop.id}) vs "${pair.keep.name}" (#${pair.keep.id}) ${pair.score}`);
            }
        });
    }
);

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(program.command('inspect').description('Show database statistics')).action(async (opts: CommonOptions) => {
    await run(opts, (db) => {
        const stats = db.getStats();
        console.log('\nCuneibib Database Statistics\n');
        console.log(`  Publications:     ${stats.publications}`);
        console.log(`  Supersessions:    ${stats.supersessions}`);
        console.log(`  Artifacts:        ${stats.artifacts}`);
        console.log(`  Editions:         ${stats.editions}`);
        console.log(`  Current editions: ${stats.currentEditions}`);
        console.log(`  Dedup pending:    ${stats.dedupPending}`);
        console.log(`  Scholars:         ${stats.scholars}`);

        const types = db.getEditionTypeCounts();
        if (Object.keys(types).length > 0) {
            console.log('\n  Edition Types:');
            for (const [type, count] of Object.entries(types)) {
                console.log(`    ${type}: ${count}`);
            }
        }
        console.log('');
    });
});

await program.parseAsync();
