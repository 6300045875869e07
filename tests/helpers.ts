import fs from 'fs';
import os from 'os';
import path from 'path';

import { CommandLineRegistry } from '../src/services/commandRegistry';
import { createConverterContext, WKHTMLTOPDF_COMMAND, type ConverterContext } from '../src/services/converterContext';

export const FAKE_RENDERER = path.join(__dirname, 'fixtures', 'fake-renderer.js');
export const FAKE_RENDERER_COMMAND = `"${process.execPath}" "${FAKE_RENDERER}"`;
export const FAKE_TEMPLATE = '-q "#{url}" "#{targetFilePath}"';

export function createFakeRegistry(command: string = FAKE_RENDERER_COMMAND, template: string = FAKE_TEMPLATE): CommandLineRegistry {
  return new CommandLineRegistry([
    {
      name: WKHTMLTOPDF_COMMAND,
      command,
      parameterString: template,
      installationDirective: 'Install the fake renderer.'
    }
  ]);
}

export async function createTempDirectory(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function createTestContext(directory: string, command?: string): Promise<ConverterContext> {
  return createConverterContext({
    artifactsDirectory: directory,
    commandRegistry: createFakeRegistry(command)
  });
}
