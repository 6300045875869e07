import { TempArtifactStore, type ArtifactStore } from './artifactStore';
import { quoteExecutable } from './commandBuilder';
import { CommandLineRegistry, loadCommandDescriptors, type CommandDescriptor, type CommandRegistry } from './commandRegistry';

export const WKHTMLTOPDF_COMMAND = 'wkhtmltopdf';

/**
 * Loads the parameter template of a command the first time it is needed and
 * keeps it for the life of the instance, even if the registry changes later.
 */
export class ParameterTemplateCache {
  private template?: string;

  constructor(private readonly registry: CommandRegistry, private readonly commandName: string) {}

  get(): string {
    if (this.template === undefined) {
      this.template = this.registry.getParametersString(this.commandName);
    }
    return this.template;
  }

  isLoaded(): boolean {
    return this.template !== undefined;
  }
}

export interface ConverterContext {
  commandName: string;
  commandRegistry: CommandRegistry;
  templates: ParameterTemplateCache;
  artifactStore: ArtifactStore;
}

export interface ConverterContextOptions {
  artifactsDirectory: string;
  commandRegistry?: CommandRegistry;
  commandName?: string;
  /** Overrides the registered invocation of the renderer, typically from WKHTMLTOPDF_PATH. */
  executablePath?: string;
  commandLinesFile?: string;
}

function withExecutableOverride(descriptors: CommandDescriptor[], commandName: string, executablePath?: string): CommandDescriptor[] {
  const override = executablePath?.trim();
  if (!override) {
    return descriptors;
  }
  return descriptors.map((descriptor) =>
    descriptor.name === commandName ? { ...descriptor, command: quoteExecutable(override) } : descriptor
  );
}

export async function createConverterContext(options: ConverterContextOptions): Promise<ConverterContext> {
  const commandName = options.commandName ?? WKHTMLTOPDF_COMMAND;
  const commandRegistry = options.commandRegistry
    ?? new CommandLineRegistry(withExecutableOverride(await loadCommandDescriptors(options.commandLinesFile), commandName, options.executablePath));

  return {
    commandName,
    commandRegistry,
    templates: new ParameterTemplateCache(commandRegistry, commandName),
    artifactStore: new TempArtifactStore(options.artifactsDirectory)
  };
}
