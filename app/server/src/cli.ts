#!/usr/bin/env tsx
import { parseArgs } from 'util';
import type { BranchRunResult, RepositoryOutcome, VersionOverrides } from '@charm-fleet/shared';
import { loadConfig, type AppConfig } from './lib/config';
import { ConfigError } from './lib/errors';
import { isFailed, renderOutcomes } from './lib/outcome';
import { renderTable } from './lib/table';
import { startServer } from './server';
import { createContext, createGitClientFactory, type OrchestratorContext } from './services/context';
import { loadCredentials } from './services/credentials-service';
import { compareImages, updateImageTags } from './services/image-service';
import { mergePullRequests, summarizePullRequests } from './services/pull-request-service';
import { ComponentRegistry } from './services/registry-service';
import { cutRelease } from './services/release-service';

const USAGE = `Usage: charm-fleet <command> [args]

Commands:
  registry build <manifest.tf...> [--exclude <url>] [--rename <from=to>]
                                         Parse manifests and write the registry dump
  registry show                          List the components of the registry
  release cut <branch> --title <title> [--body <body>] [--required-version <v>]
              [--provider <name=version>] [--no-pin-channel] [--dry-run]
                                         Cut a release across every repository
  pulls <branch> [--merge] [--force]     Summarize (and merge) pull requests
  images                                 Compare declared image tags with the registry
  images update <branch> --title <title> [--body <body>] [--dry-run]
                                         Open pull requests bumping outdated images
  serve                                  Start the HTTP service`;

const [command, ...rest] = process.argv.slice(2);

function parsePairs(values: string[] | undefined, flag: string): Record<string, string> {
  const pairs: Record<string, string> = {};
  for (const value of values ?? []) {
    const separator = value.indexOf('=');
    if (separator <= 0) {
      throw new ConfigError(`${flag} expects <name=value>, got "${value}"`);
    }
    pairs[value.slice(0, separator)] = value.slice(separator + 1);
  }
  return pairs;
}

function requireValue(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigError(`${name} is required\n\n${USAGE}`);
  }
  return value;
}

function report(outcomes: readonly RepositoryOutcome<BranchRunResult>[]): void {
  console.log(
    renderOutcomes(outcomes, (result) => result.pullRequest?.url ?? `committed on ${result.branch}`)
  );
  if (outcomes.some(isFailed)) {
    process.exitCode = 1;
  }
}

async function openContext(config: AppConfig): Promise<OrchestratorContext> {
  const credentials = await loadCredentials(config.credentialsPath);
  const registry = await ComponentRegistry.load(
    config.registryPath,
    createGitClientFactory(config, credentials)
  );
  return createContext(config, registry);
}

async function handleRegistry(config: AppConfig, args: string[]) {
  const [subcommand, ...params] = args;
  const { values, positionals } = parseArgs({
    args: params,
    allowPositionals: true,
    options: {
      exclude: { type: 'string', multiple: true },
      rename: { type: 'string', multiple: true },
    },
  });

  switch (subcommand) {
    case 'build': {
      if (positionals.length === 0) {
        throw new ConfigError('registry build needs at least one manifest file');
      }
      const credentials = await loadCredentials(config.credentialsPath);
      const registry = await ComponentRegistry.fromManifests(
        positionals,
        createGitClientFactory(config, credentials),
        {
          exclude: [...config.exclude, ...(values.exclude ?? [])],
          renames: parsePairs(values.rename, '--rename'),
        }
      );
      await registry.dump(config.registryPath);
      console.log(
        `Wrote ${registry.size} components from ${registry.clients().length} repositories to ${config.registryPath}`
      );
      break;
    }
    case 'show': {
      const context = await openContext(config);
      console.log(
        renderTable(
          ['component', 'repository', 'ref', 'path'],
          context.registry.describe().flatMap((component) =>
            component.references.map((reference) => [
              component.name,
              reference.repositoryUrl,
              reference.ref,
              reference.subpath,
            ])
          )
        )
      );
      break;
    }
    default:
      throw new ConfigError(`Unknown registry command "${subcommand ?? ''}"\n\n${USAGE}`);
  }
}

async function handleRelease(config: AppConfig, args: string[]) {
  const [subcommand, ...params] = args;
  if (subcommand !== 'cut') {
    throw new ConfigError(`Unknown release command "${subcommand ?? ''}"\n\n${USAGE}`);
  }
  const { values, positionals } = parseArgs({
    args: params,
    allowPositionals: true,
    options: {
      title: { type: 'string' },
      body: { type: 'string' },
      'required-version': { type: 'string' },
      provider: { type: 'string', multiple: true },
      'no-pin-channel': { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
    },
  });

  const providers = parsePairs(values.provider, '--provider');
  const overrides: VersionOverrides = {
    pinChannel: !values['no-pin-channel'],
    requiredVersion: values['required-version'],
    providers: Object.keys(providers).length > 0 ? providers : undefined,
  };

  const context = await openContext(config);
  const run = await cutRelease(context, {
    branchName: requireValue(positionals[0], '<branch>'),
    title: requireValue(values.title, '--title'),
    body: values.body,
    overrides,
    dryRun: values['dry-run'],
  });
  console.log(`Run ${run.runId}`);
  report(run.outcomes);
}

async function handlePulls(config: AppConfig, args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      merge: { type: 'boolean', default: false },
      force: { type: 'boolean', default: false },
    },
  });

  const context = await openContext(config);
  const summary = await summarizePullRequests(context, requireValue(positionals[0], '<branch>'));
  console.log(summary.table());
  for (const failure of summary.failures) {
    console.error(`${failure.repository}: ${failure.error.message}`);
  }

  if (values.merge) {
    const run = await mergePullRequests(context, summary, { force: values.force });
    console.log(`Run ${run.runId}`);
    console.log(renderOutcomes(run.outcomes, (result) => result.url));
  }
  if (summary.failures.length > 0) {
    process.exitCode = 1;
  }
}

async function handleImages(config: AppConfig, args: string[]) {
  const [subcommand, ...params] = args;
  const context = await openContext(config);

  if (subcommand === undefined) {
    const summary = await compareImages(context);
    console.log(
      renderTable(
        ['repo', 'component', 'resource', 'declared', 'latest'],
        summary.deltas.map((delta) => [
          delta.repository,
          delta.component,
          delta.resource,
          delta.declaredTag,
          delta.latestTag,
        ])
      )
    );
    for (const failure of summary.failures) {
      console.error(`${failure.repository}: ${failure.error.message}`);
    }
    return;
  }

  if (subcommand !== 'update') {
    throw new ConfigError(`Unknown images command "${subcommand}"\n\n${USAGE}`);
  }
  const { values, positionals } = parseArgs({
    args: params,
    allowPositionals: true,
    options: {
      title: { type: 'string' },
      body: { type: 'string' },
      'dry-run': { type: 'boolean', default: false },
    },
  });
  const summary = await compareImages(context);
  const run = await updateImageTags(context, {
    branchName: requireValue(positionals[0], '<branch>'),
    title: requireValue(values.title, '--title'),
    body: values.body,
    dryRun: values['dry-run'],
    summary,
  });
  console.log(`Run ${run.runId}`);
  report(run.outcomes);
}

async function run() {
  const config = loadConfig();

  switch (command) {
    case 'registry':
      await handleRegistry(config, rest);
      break;
    case 'release':
      await handleRelease(config, rest);
      break;
    case 'pulls':
      await handlePulls(config, rest);
      break;
    case 'images':
      await handleImages(config, rest);
      break;
    case 'serve':
      await startServer(config);
      break;
    default:
      console.error(USAGE);
      process.exit(1);
  }
}

run().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
