import fs from 'fs';
import path from 'path';

import { ConfigurationError } from '../errors';
import { parseCommandLine } from './commandBuilder';

export interface CommandDescriptor {
  name: string;
  /** How the tool is invoked: a bare name looked up on PATH, or a path. */
  command: string;
  parameterString: string;
  installationDirective?: string;
}

export interface CommandAvailability {
  available: boolean;
  errorMessage?: string;
  installationDirective?: string;
}

export interface CommandRegistry {
  getCommandAvailability(name: string): Promise<CommandAvailability>;
  getParametersString(name: string): string;
  getCommand(name: string): string;
}

export const DEFAULT_COMMAND_LINES_FILE = path.resolve(process.cwd(), 'config', 'commandLines.json');

export class CommandLineRegistry implements CommandRegistry {
  private readonly descriptors = new Map<string, CommandDescriptor>();
  private readonly availability = new Map<string, CommandAvailability>();

  constructor(descriptors: CommandDescriptor[]) {
    for (const descriptor of descriptors) {
      this.descriptors.set(descriptor.name, descriptor);
    }
  }

  getParametersString(name: string): string {
    return this.requireDescriptor(name).parameterString;
  }

  getCommand(name: string): string {
    return this.requireDescriptor(name).command;
  }

  async getCommandAvailability(name: string): Promise<CommandAvailability> {
    const cached = this.availability.get(name);
    if (cached) {
      return cached;
    }

    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      return { available: false, errorMessage: `Command "${name}" is not registered.` };
    }

    let executable: string | undefined;
    try {
      executable = parseCommandLine(descriptor.command)[0];
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Invalid command.';
      return { available: false, errorMessage: message, installationDirective: descriptor.installationDirective };
    }

    const found = executable ? await findExecutable(executable) : undefined;
    const result: CommandAvailability = found
      ? { available: true }
      : {
          available: false,
          errorMessage: `Executable "${executable ?? descriptor.command}" was not found.`,
          installationDirective: descriptor.installationDirective
        };

    // a renderer installed after startup is picked up on the next check
    if (result.available) {
      this.availability.set(name, result);
    }
    return result;
  }

  private requireDescriptor(name: string): CommandDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new ConfigurationError(`No command line is registered under "${name}".`);
    }
    return descriptor;
  }
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    if (!stats.isFile()) {
      return false;
    }
    await fs.promises.access(filePath, process.platform === 'win32' ? fs.constants.F_OK : fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function findExecutable(executable: string): Promise<string | undefined> {
  const candidatesFor = (base: string): string[] => {
    if (process.platform !== 'win32' || path.extname(base)) {
      return [base];
    }
    const extensions = (process.env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean);
    return [base, ...extensions.map((extension) => `${base}${extension}`)];
  };

  if (executable.includes('/') || executable.includes('\\')) {
    for (const candidate of candidatesFor(path.resolve(executable))) {
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  const searchPath = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
  for (const directory of searchPath) {
    for (const candidate of candidatesFor(path.join(directory, executable))) {
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return undefined;
}

function isCommandDescriptor(value: unknown): value is CommandDescriptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'command' in value &&
    typeof value.command === 'string' &&
    'parameterString' in value &&
    typeof value.parameterString === 'string' &&
    (!('installationDirective' in value) || typeof value.installationDirective === 'string')
  );
}

export async function loadCommandDescriptors(filePath: string = process.env.COMMAND_LINES_FILE ?? DEFAULT_COMMAND_LINES_FILE): Promise<CommandDescriptor[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Unable to read command lines from "${filePath}".`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Command lines file "${filePath}" is not valid JSON.`, { cause: error });
  }

  const commands = typeof parsed === 'object' && parsed !== null && 'commands' in parsed ? parsed.commands : undefined;
  if (!Array.isArray(commands) || !commands.every(isCommandDescriptor)) {
    throw new ConfigurationError(`Command lines file "${filePath}" must contain a "commands" array of { name, command, parameterString }.`);
  }

  return commands;
}
