/**
 * Operator command surface
 * 操作员命令接口
 *
 * Parsing chat input is the host's job; it passes the command name and the
 * remaining words here.
 * 聊天输入的解析由宿主负责，这里只接收命令名和其余参数。
 */

import type { ModeController, TransitionResult } from './ModeController';

export const COMMAND_NAMES = [
  'start-autorecord',
  'stop-autorecord',
  'start-recording',
  'stop-recording',
  'start-replay',
  'stop-replay',
  'save-current-recording',
  'force-all-to-spectate',
  'load-recording',
  'create-save-point'
] as const;

export type CommandName = typeof COMMAND_NAMES[number];

export type CommandHandler = (args: readonly string[]) => TransitionResult;

/**
 * One handler per command, bound to a controller
 * 每个命令一个处理器，绑定到控制器
 */
export function createCommandHandlers(controller: ModeController): Record<CommandName, CommandHandler> {
  const requireName = (command: CommandName, args: readonly string[], run: (name: string) => TransitionResult): TransitionResult => {
    const name = args.join(' ').trim();
    if (name === '') {
      const message = `Usage: ${command} <name>`;
      controller.notify(message);
      return { ok: false, message };
    }
    return run(name);
  };

  return {
    'start-autorecord': () => controller.setAutorecord(true),
    'stop-autorecord': () => controller.setAutorecord(false),
    'start-recording': () => controller.startRecording(),
    'stop-recording': () => controller.stopRecording(),
    'start-replay': (args) => controller.startReplay(args.length > 0 ? args.join(' ') : undefined),
    'stop-replay': () => controller.stopReplay(),
    'save-current-recording': () => controller.saveRecording(),
    'force-all-to-spectate': () => controller.forceAllToSpectate(),
    'load-recording': (args) => requireName('load-recording', args, name => controller.loadRecording(name)),
    'create-save-point': (args) => requireName('create-save-point', args, name => controller.createSavePoint(name))
  };
}

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some(command => command === name);
}

/**
 * Dispatches commands by name
 * 按名称分发命令
 */
export class CommandHandlers {
  private readonly handlers: Record<CommandName, CommandHandler>;

  constructor(private readonly controller: ModeController) {
    this.handlers = createCommandHandlers(controller);
  }

  names(): readonly CommandName[] {
    return COMMAND_NAMES;
  }

  run(name: string, args: readonly string[] = []): TransitionResult {
    if (!isCommandName(name)) {
      const message = `Unknown command: ${name}`;
      this.controller.notify(message);
      return { ok: false, message };
    }
    return this.handlers[name](args);
  }
}
