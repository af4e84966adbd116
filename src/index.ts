#!/usr/bin/env node
import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { CONFIG_CANDIDATES, findConfigPath, findRepo, loadConfig, repoRoot } from './config.js';
import { UsageError, errorMessage, isUserError } from './errors.js';
import { StampStore, isValidationMode } from './stamp.js';
import { AggregatedIndex } from './aggregated-index.js';
import { serializeFingerprints } from './fingerprints.js';
import { writeFileAtomic } from './output.js';
import { Pipeline, OUTPUT_PATHS, repoFingerprintPath } from './pipeline.js';
import { applyRepairPlan, planPath, readPlan, writePlan } from './repair-planner.js';
import { validateRepo } from './validator.js';
import { exportCanonical } from './canonical.js';
import { registerRepo } from './registry.js';
import { FAILED_OUTCOMES, loadDocRegistry, syncDocs } from './doc-sync.js';
import { stampWorkflowHeaders } from './workflow-headers.js';
import type { LoadedConfig, RepoConfig } from './config.js';

const program = new Command();

program
  .name('fleetgov')
  .description('Govern a fleet of repositories from a hub: fingerprints, stamps, dependency gating, repairs')
  .version('0.1.0')
  .option('--hub <dir>', 'Hub repository root', process.cwd())
  .option('--config <path>', `Configuration file (default: ${CONFIG_CANDIDATES.join(' or ')})`);

function hubOptions(): { hub: string; config?: string } {
  const opts = program.opts<{ hub: string; config?: string }>();
  return { hub: resolve(opts.hub), config: opts.config };
}

function loadHub(): LoadedConfig {
  const { hub, config } = hubOptions();
  return loadConfig(hub, config);
}

function requireRepo(loaded: LoadedConfig, name: string): RepoConfig {
  const repo = findRepo(loaded.config, name);
  if (!repo) throw new UsageError(`Repository "${name}" is not configured`);
  return repo;
}

function fail(err: unknown): never {
  console.error(chalk.red(errorMessage(err)));
  process.exit(isUserError(err) ? 2 : 1);
}

program
  .command('cycle')
  .description('Run the full governance cycle: scan, stamps, graph, repair plans')
  .action(async () => {
    const spinner = ora('Loading configuration...').start();
    try {
      const loaded = loadHub();
      const pipeline = new Pipeline({
        loaded,
        stamps: new StampStore(),
        log: (msg) => {
          if (msg.startsWith('Phase')) {
            spinner.text = msg;
          } else {
            spinner.stop();
            console.log(chalk.dim(msg));
            spinner.start();
          }
        },
      });
      const result = await pipeline.runFull();
      const verdict = result.report.overallStatus === 'ok'
        ? chalk.green('ok')
        : chalk.yellow('degraded');

      spinner.succeed(chalk.green('Governance cycle complete'));
      console.log('');
      console.log(`  Files fingerprinted: ${chalk.bold(String(result.filesScanned))}`);
      console.log(`  Unreadable files:    ${chalk.bold(String(result.scanErrors))}`);
      console.log(`  Cycles:              ${chalk.bold(String(result.report.cycles.length))}`);
      console.log(`  Overall status:      ${verdict}`);
      console.log('');
      console.log(`Status written to ${chalk.cyan(OUTPUT_PATHS.status)}`);
    } catch (err) {
      spinner.fail('Governance cycle failed');
      fail(err);
    }
  });

program
  .command('scan')
  .description('Fingerprint one repository into repos/<name>/files.jsonl')
  .argument('<repo>', 'Configured repository name')
  .action(async (name: string) => {
    try {
      const loaded = loadHub();
      const repo = requireRepo(loaded, name);
      const root = repoRoot(loaded.hubRoot, repo);
      if (!existsSync(root)) throw new UsageError(`Working copy for ${name} not found at ${root}`);

      const spinner = ora(`Scanning ${name}...`).start();
      const pipeline = new Pipeline({ loaded, stamps: new StampStore() });
      const scan = await pipeline.scanRepo(repo);
      const out = repoFingerprintPath(loaded.hubRoot, name);
      writeFileAtomic(out, serializeFingerprints(scan.records));
      spinner.succeed(`${scan.records.length} files fingerprinted`);
      for (const err of scan.errors) console.log(chalk.yellow(`  unreadable: ${err.path} (${err.message})`));
      console.log(`Wrote ${chalk.cyan(out)}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('validate')
  .description('Validate a repository working copy and record its validation stamp')
  .argument('<repo>', 'Configured repository name')
  .option('--mode <mode>', 'Validation mode: build or prod', 'build')
  .option('--commit <sha>', 'Commit being validated (default: $GITHUB_SHA)')
  .action(async (name: string, options: { mode: string; commit?: string }) => {
    try {
      if (!isValidationMode(options.mode)) throw new UsageError(`--mode must be "build" or "prod", got "${options.mode}"`);
      const loaded = loadHub();
      const repo = requireRepo(loaded, name);
      const pipeline = new Pipeline({ loaded, stamps: new StampStore() });
      const result = await validateRepo({
        repo: name,
        repoRoot: repoRoot(loaded.hubRoot, repo),
        mode: options.mode,
        commit: options.commit ?? (process.env.GITHUB_SHA?.trim() || 'unknown'),
        rules: repo.validation,
        include: repo.include ?? loaded.config.include,
        exclude: loaded.config.exclude,
        files: await pipeline.trackedFiles(repo),
        concurrency: loaded.config.hashConcurrency,
        stamps: new StampStore(),
      });

      for (const w of result.check.warnings) console.log(chalk.yellow(`  ⚠ ${w}`));
      for (const i of result.check.issues) console.log(chalk.red(`  ✖ ${i}`));
      if (!result.stamp) {
        console.log(chalk.red('Validation failed; stamp not updated.'));
        process.exit(1);
      }
      console.log(chalk.green(`✓ ${name} validated (${options.mode})`));
      console.log(`  commit=${result.stamp.commit} highest_mode=${result.stamp.highestMode} meta_sha256=${result.stamp.contentIndexHash}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('plan')
  .description('Compute the repair plan for one repository from the aggregated index')
  .argument('<repo>', 'Configured repository name')
  .action(async (name: string) => {
    try {
      const loaded = loadHub();
      const repo = requireRepo(loaded, name);
      const index = AggregatedIndex.load(join(loaded.hubRoot, OUTPUT_PATHS.aggregated));
      const pipeline = new Pipeline({ loaded, stamps: new StampStore() });
      const plan = await pipeline.planFor(repo, index);
      if (!plan) {
        console.log(chalk.yellow(`${name} has no fingerprint records; run \`fleetgov cycle\` first. No plan written.`));
        return;
      }
      writePlan(planPath(loaded.hubRoot, name), plan);
      if (plan.actions.length === 0) {
        console.log(chalk.green(`${name}: no drift`));
        return;
      }
      for (const a of plan.actions) {
        console.log(a.type === 'write_file'
          ? `  write_file ${a.targetPath} (${a.reason})`
          : `  move_file ${a.fromPath} -> ${a.toPath}`);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command('apply')
  .description('Apply a repair plan to a repository working copy')
  .argument('<repo>', 'Configured repository name')
  .option('--plan <path>', 'Plan file (default: repairs/<repo>/repair_plan.json)')
  .action((name: string, options: { plan?: string }) => {
    try {
      const loaded = loadHub();
      const repo = requireRepo(loaded, name);
      const path = options.plan ? resolve(options.plan) : planPath(loaded.hubRoot, name);
      if (!existsSync(path)) throw new UsageError(`No repair plan at ${path}`);
      const plan = readPlan(path);
      if (plan.repo !== name) throw new UsageError(`Plan at ${path} is for ${plan.repo}, not ${name}`);

      const results = applyRepairPlan(plan, repoRoot(loaded.hubRoot, repo), loaded.hubRoot);
      let failed = 0;
      for (const r of results) {
        const label = r.action.type === 'write_file' ? r.action.targetPath : `${r.action.fromPath} -> ${r.action.toPath}`;
        if (r.outcome === 'applied') console.log(chalk.green(`  ✓ ${label}`));
        else if (r.outcome === 'skipped') console.log(chalk.dim(`  - ${label} (${r.message})`));
        else {
          failed++;
          console.log(chalk.red(`  ✖ ${label} (${r.message})`));
        }
      }
      if (failed > 0) process.exit(1);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('status')
  .description('Print the last dependency status document')
  .option('--strict', 'Exit 1 when the status is degraded')
  .action((options: { strict?: boolean }) => {
    const { hub } = hubOptions();
    const path = join(hub, OUTPUT_PATHS.status);
    if (!existsSync(path)) {
      console.log(chalk.yellow('No dependency status yet.'));
      console.log(`Run ${chalk.cyan('fleetgov cycle')} to evaluate the fleet.`);
      return;
    }
    const raw = readFileSync(path, 'utf-8');
    console.log(raw.trimEnd());
    const doc: unknown = JSON.parse(raw);
    const degraded = typeof doc === 'object' && doc !== null
      && 'overall_status' in doc && doc.overall_status === 'degraded';
    if (options.strict && degraded) process.exit(1);
  });

program
  .command('export-canonical')
  .description("Copy a repository's canonical surface files into the hub")
  .argument('<repo>', 'Configured repository name')
  .action((name: string) => {
    try {
      const loaded = loadHub();
      const repo = requireRepo(loaded, name);
      if (!repo.canonical) throw new UsageError(`${name} has no canonical root configured`);
      const result = exportCanonical(
        repoRoot(loaded.hubRoot, repo),
        join(loaded.hubRoot, repo.canonical.root),
        repo.canonical.files,
      );
      for (const f of result.copied) console.log(chalk.green(`  ✓ ${f}`));
      for (const f of result.skipped) console.log(chalk.yellow(`  ⚠ missing source: ${f}`));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('register')
  .description('Add or update a repository entry in the hub configuration')
  .requiredOption('--name <name>', 'Repository name')
  .requiredOption('--path <path>', 'Working copy path, relative to the hub')
  .option('--depends-on <names>', 'Comma-separated dependency names')
  .option('--canonical <dir>', 'Canonical root, relative to the hub')
  .action((options: { name: string; path: string; dependsOn?: string; canonical?: string }) => {
    try {
      const { hub, config } = hubOptions();
      const configPath = config ? resolve(hub, config) : findConfigPath(hub) ?? join(hub, CONFIG_CANDIDATES[0]);
      registerRepo(configPath, {
        name: options.name,
        path: options.path,
        dependsOn: options.dependsOn?.split(',').map(s => s.trim()).filter(Boolean),
        canonicalRoot: options.canonical,
      });
      console.log(chalk.green(`✓ Registered ${options.name} in ${configPath}`));
    } catch (err) {
      fail(err);
    }
  });

program
  .command('sync-docs')
  .description('Render canonical documents into a repository through its templates')
  .argument('<repo>', 'Configured repository name')
  .requiredOption('--registry <path>', 'Doc registry JSON')
  .option('--source-root <dir>', 'Checkout holding the canonical documents (default: the hub)')
  .option('--dry-run', 'Report outcomes without writing')
  .action((name: string, options: { registry: string; sourceRoot?: string; dryRun?: boolean }) => {
    try {
      const loaded = loadHub();
      const repo = requireRepo(loaded, name);
      const results = syncDocs({
        registry: loadDocRegistry(resolve(options.registry)),
        sourceRoot: options.sourceRoot ? resolve(options.sourceRoot) : loaded.hubRoot,
        repoRoot: repoRoot(loaded.hubRoot, repo),
        repoName: name,
        dryRun: options.dryRun,
      });
      let failed = 0;
      for (const r of results) {
        if (FAILED_OUTCOMES.has(r.outcome)) {
          failed++;
          console.log(chalk.red(`  ${r.outcome}: ${r.targetPath}`));
        } else {
          console.log(r.outcome === 'updated' ? chalk.green(`  updated: ${r.targetPath}`) : chalk.dim(`  unchanged: ${r.targetPath}`));
        }
      }
      if (failed > 0) process.exit(1);
    } catch (err) {
      fail(err);
    }
  });

program
  .command('stamp-workflows')
  .description('Stamp workflow files with the canonical lock header')
  .argument('<repo>', 'Configured repository name')
  .action((name: string) => {
    try {
      const loaded = loadHub();
      const repo = requireRepo(loaded, name);
      for (const r of stampWorkflowHeaders(repoRoot(loaded.hubRoot, repo))) {
        const line = `  ${r.outcome}: ${r.path}`;
        console.log(r.outcome === 'stamped' ? chalk.green(line) : chalk.dim(line));
      }
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch(fail);
