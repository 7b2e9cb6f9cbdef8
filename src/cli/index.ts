#!/usr/bin/env node
import path from 'path';
import fs from 'fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { DependencyResolver } from '../builder/dependency-resolver';
import { parseZigSource } from '../parsers/zig';
import { extractDescriptionOnly } from '../parsers/doc-comment';
import { ZigCommand } from '../services/zig-command';
import { formatSource } from '../services/formatter';
import { stagingDirectory } from '../services/staging-service';
import { logger, config, flushLogs } from '../utils';
import { NifBuildError, errorMessage } from '../utils/errors';

function reportError(error: unknown): never {
  if (error instanceof NifBuildError) {
    console.error(chalk.red(`❌ ${error.code}: ${error.message}`));
  } else {
    console.error(chalk.red(`❌ Error: ${errorMessage(error)}`));
  }
  process.exit(1);
}

const program = new Command();

program
  .name('nifwright')
  .description('Inspect, format and stage Zig sources for verified NIF builds')
  .version('0.1.0');

program
  .command('deps')
  .description('List every file a Zig source pulls in through @import and @embedFile')
  .argument('<file>', 'Zig source file')
  .option('--root <dir>', 'Report paths relative to this directory', process.cwd())
  .option('--json', 'Print the dependency set as JSON', false)
  .action(async (file: string, options: { root: string; json: boolean }) => {
    try {
      const source = await fs.readFile(file, 'utf-8');
      const resolver = new DependencyResolver({ rootDir: options.root });
      const dependencies = await resolver.resolve(source, path.resolve(file));

      if (options.json) {
        console.log(JSON.stringify(dependencies, null, 2));
      } else if (dependencies.length === 0) {
        console.log(chalk.gray('No file dependencies'));
      } else {
        console.log(chalk.blue(`${dependencies.length} dependencies:`));
        dependencies.forEach(dependency => console.log(`  ${dependency}`));
      }
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('inspect')
  .description('Show the top-level declarations of a Zig source and their doc comments')
  .argument('<file>', 'Zig source file')
  .option('--pub-only', 'Only show pub declarations', false)
  .action(async (file: string, options: { pubOnly: boolean }) => {
    try {
      const parsed = parseZigSource(await fs.readFile(file, 'utf-8'));
      const declarations = parsed.declarations.filter(d => !options.pubOnly || d.isPub);

      if (parsed.moduleDoc) {
        console.log(chalk.gray(extractDescriptionOnly(parsed.moduleDoc)));
      }

      for (const declaration of declarations) {
        const visibility = declaration.isPub ? 'pub ' : '';
        const header = `${visibility}${declaration.kind} ${chalk.bold(declaration.name)} ${chalk.gray(`(line ${declaration.line})`)}`;
        console.log(header);
        if (declaration.docComment) {
          console.log(chalk.gray(`    ${extractDescriptionOnly(declaration.docComment)}`));
        }
      }
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('format')
  .description('Format a Zig source in place with zig fmt (generated files are skipped)')
  .argument('<file>', 'Zig source file')
  .option('--zig <path>', 'Zig executable', config.toolchain.zigExecutable)
  .action(async (file: string, options: { zig: string }) => {
    const spinner = ora(`Formatting ${file}...`).start();
    try {
      const contents = await fs.readFile(file, 'utf-8');
      const formatted = await formatSource(contents, new ZigCommand(options.zig));

      if (formatted === contents) {
        spinner.succeed('Already formatted');
      } else {
        await fs.writeFile(file, formatted, 'utf-8');
        spinner.succeed(`Formatted ${file}`);
      }
      await flushLogs();
    } catch (error) {
      spinner.fail('Formatting failed');
      reportError(error);
    }
  });

program
  .command('staging-dir')
  .description('Print the staging directory a module builds in')
  .argument('<module>', 'Module identifier')
  .option('--env <env>', 'Build environment tag', config.toolchain.buildEnv)
  .action((moduleName: string, options: { env: string }) => {
    console.log(stagingDirectory(moduleName, options.env));
  });

program.configureHelp({
  sortSubcommands: true,
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason: errorMessage(reason) });
  console.error(chalk.red('\n💥 Unhandled promise rejection:'), reason);
  process.exit(1);
});

program.parseAsync().catch(reportError);
