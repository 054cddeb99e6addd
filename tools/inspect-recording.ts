#!/usr/bin/env node

/**
 * CLI tool for inspecting saved match recordings
 * 检查已保存比赛录制的CLI工具
 *
 * Summarizes, validates and exports recordings written by the mode controller.
 * 汇总、校验和导出由模式控制器写入的录制。
 */

import * as fs from 'fs';
import * as path from 'path';
import { program } from 'commander';
import chalk from 'chalk';
import glob from 'glob';
import { SessionRecording } from '../src/recording/SessionRecording';
import { ArchiveFormat, RecordingArchive } from '../src/format/RecordingArchive';

/**
 * Summary of one recording file
 * 单个录制文件的摘要
 */
export interface RecordingSummary {
  filePath: string;
  mapName: string;
  ticks: number;
  entities: number;
  players: number;
  duration: number;
  savePoints: Array<{ name: string; tick: number }>;
  problems: string[];
}

/**
 * Expand glob patterns into a sorted, de-duplicated file list
 * 将glob模式展开为排序去重的文件列表
 */
export function expandInputs(patterns: readonly string[]): string[] {
  const files = new Set<string>();
  for (const pattern of patterns) {
    if (glob.hasMagic(pattern)) {
      glob.sync(pattern, { absolute: true }).forEach(file => files.add(file));
    } else {
      files.add(path.resolve(pattern));
    }
  }
  return Array.from(files).sort();
}

export function summarize(filePath: string, recording: SessionRecording): RecordingSummary {
  const metas = recording.getAllMeta();
  return {
    filePath,
    mapName: recording.getMapName(),
    ticks: recording.getNumRecordedTicks(),
    entities: metas.length,
    players: metas.filter(m => m.hasPlayer()).length,
    duration: recording.getEndTime() - recording.getStartTime(),
    savePoints: recording.getSavePoints(),
    problems: recording.validate()
  };
}

/**
 * Main CLI class
 * 主要CLI类
 */
class RecordingInspectorCLI {
  private archive = new RecordingArchive();

  /**
   * Parse one file, printing the failure instead of throwing
   * 解析单个文件，失败时打印错误而不是抛出
   */
  async load(filePath: string): Promise<SessionRecording | undefined> {
    const relative = path.relative(process.cwd(), filePath);
    try {
      const text = await fs.promises.readFile(filePath, 'utf-8');
      return SessionRecording.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.log(chalk.red(`❌ Failed to read: ${relative}`));
      console.log(chalk.red(`   └── ${message}`));
      return undefined;
    }
  }

  async summary(patterns: string[]): Promise<number> {
    const files = expandInputs(patterns);
    if (files.length === 0) {
      console.log(chalk.yellow('⚠️  No input files found'));
      return 1;
    }

    let failed = 0;
    for (const file of files) {
      const recording = await this.load(file);
      if (!recording) {
        failed++;
        continue;
      }

      const s = summarize(file, recording);
      console.log(chalk.blue(`📼 ${path.relative(process.cwd(), file)}`));
      console.log(chalk.gray(`   ├── map: ${s.mapName}`));
      console.log(chalk.gray(`   ├── ticks: ${s.ticks}, duration: ${s.duration}`));
      console.log(chalk.gray(`   ├── entities: ${s.entities} (${s.players} with players)`));
      const marks = s.savePoints.map(p => `${p.name}@${p.tick}`).join(', ') || 'none';
      console.log(chalk.gray(`   └── save points: ${marks}`));
    }
    return failed > 0 ? 1 : 0;
  }

  async validate(patterns: string[]): Promise<number> {
    const files = expandInputs(patterns);
    if (files.length === 0) {
      console.log(chalk.yellow('⚠️  No input files found'));
      return 1;
    }

    let failed = 0;
    for (const file of files) {
      const relative = path.relative(process.cwd(), file);
      const recording = await this.load(file);
      if (!recording) {
        failed++;
        continue;
      }

      const problems = recording.validate();
      if (problems.length === 0) {
        console.log(chalk.green(`✅ ${relative}`));
        continue;
      }

      failed++;
      console.log(chalk.red(`❌ ${relative}: ${problems.length} problem(s)`));
      for (const problem of problems) {
        console.log(chalk.red(`   └── ${problem}`));
      }
    }

    console.log('');
    console.log(chalk.blue(`📊 ${files.length - failed} valid, ${failed} invalid`));
    return failed > 0 ? 1 : 0;
  }

  async export(input: string, output: string, format: ArchiveFormat): Promise<number> {
    const recording = await this.load(path.resolve(input));
    if (!recording) return 1;

    const result = await this.archive.export(recording, format);
    await fs.promises.mkdir(path.dirname(path.resolve(output)), { recursive: true });
    await fs.promises.writeFile(output, result.data);

    console.log(chalk.green(`✅ Exported ${format} archive: ${output}`));
    console.log(chalk.gray(`   └── ${result.size} bytes, ${result.time.toFixed(1)}ms`));
    return 0;
  }
}

function parseFormat(value: string): ArchiveFormat {
  switch (value) {
    case ArchiveFormat.JSON:
      return ArchiveFormat.JSON;
    case ArchiveFormat.Binary:
      return ArchiveFormat.Binary;
    default:
      throw new Error(`Unknown archive format "${value}" (use json or binary)`);
  }
}

/**
 * Main program entry point
 * 主程序入口点
 */
async function main(): Promise<void> {
  const cli = new RecordingInspectorCLI();

  program
    .name('inspect-recording')
    .description('Inspect saved match recordings')
    .version('0.1.0');

  program
    .command('summary')
    .description('Print map, tick count, entities and save points')
    .argument('<input...>', 'Recording files (supports glob patterns)')
    .action(async (input: string[]) => {
      process.exit(await cli.summary(input));
    });

  program
    .command('validate')
    .description('Check that recordings parse and every sample has a meta')
    .argument('<input...>', 'Recording files (supports glob patterns)')
    .action(async (input: string[]) => {
      process.exit(await cli.validate(input));
    });

  program
    .command('export')
    .description('Convert a recording to a JSON or binary archive')
    .argument('<input>', 'Recording file')
    .requiredOption('-o, --output <path>', 'Output file')
    .option('-f, --format <format>', 'Archive format (json/binary)', 'json')
    .action(async (input: string, options: { output: string; format: string }) => {
      process.exit(await cli.export(input, options.output, parseFormat(options.format)));
    });

  program.addHelpText('after', `
Examples:
  inspect-recording summary "replays/*.cfg"
  inspect-recording validate session_20261019_071502_match1recording0.cfg
  inspect-recording export match.cfg -o match.bin -f binary
`);

  await program.parseAsync();
}

// Run the CLI tool 运行CLI工具
if (require.main === module) {
  main().catch(error => {
    console.error(chalk.red('❌ Unhandled error:'), error);
    process.exit(1);
  });
}

export { RecordingInspectorCLI };
