import fs from 'fs';
import path from 'path';

import { ConfigurationError } from '../src/errors';
import { CommandLineRegistry, findExecutable, loadCommandDescriptors } from '../src/services/commandRegistry';
import { createConverterContext } from '../src/services/converterContext';
import { createTempDirectory } from './helpers';

describe('command registry', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDirectory('command-registry-');
  });

  afterEach(async () => {
    await fs.promises.rm(directory, { recursive: true, force: true });
  });

  it('loads the bundled wkhtmltopdf declaration', async () => {
    const descriptors = await loadCommandDescriptors(path.resolve(__dirname, '..', 'config', 'commandLines.json'));
    const registry = new CommandLineRegistry(descriptors);

    expect(registry.getCommand('wkhtmltopdf')).toBe('wkhtmltopdf');
    expect(registry.getParametersString('wkhtmltopdf')).toBe(
      '-q --load-error-handling ignore --load-media-error-handling ignore "#{url}" "#{targetFilePath}"'
    );
  });

  it('rejects a malformed declaration file', async () => {
    const filePath = path.join(directory, 'commandLines.json');
    await fs.promises.writeFile(filePath, JSON.stringify({ commands: [{ name: 'wkhtmltopdf' }] }));

    await expect(loadCommandDescriptors(filePath)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a declaration file that is not JSON', async () => {
    const filePath = path.join(directory, 'commandLines.json');
    await fs.promises.writeFile(filePath, '<commands/>');

    await expect(loadCommandDescriptors(filePath)).rejects.toThrow(`Command lines file "${filePath}" is not valid JSON.`);
  });

  it('reports a missing executable with its installation directive', async () => {
    const registry = new CommandLineRegistry([
      { name: 'wkhtmltopdf', command: '/nonexistent/wkhtmltopdf', parameterString: '', installationDirective: 'Install it.' }
    ]);

    await expect(registry.getCommandAvailability('wkhtmltopdf')).resolves.toEqual({
      available: false,
      errorMessage: 'Executable "/nonexistent/wkhtmltopdf" was not found.',
      installationDirective: 'Install it.'
    });
  });

  it('notices a renderer installed after a failed check', async () => {
    const executable = path.join(directory, 'wkhtmltopdf');
    const registry = new CommandLineRegistry([{ name: 'wkhtmltopdf', command: executable, parameterString: '' }]);

    await expect(registry.getCommandAvailability('wkhtmltopdf')).resolves.toMatchObject({ available: false });

    await fs.promises.writeFile(executable, '#!/bin/sh\n', { mode: 0o755 });

    await expect(registry.getCommandAvailability('wkhtmltopdf')).resolves.toEqual({ available: true });
  });

  it('reports an unknown command as unavailable', async () => {
    const registry = new CommandLineRegistry([]);

    await expect(registry.getCommandAvailability('wkhtmltopdf')).resolves.toEqual({
      available: false,
      errorMessage: 'Command "wkhtmltopdf" is not registered.'
    });
    expect(() => registry.getCommand('wkhtmltopdf')).toThrow('No command line is registered under "wkhtmltopdf".');
  });

  it('finds executables by path', async () => {
    await expect(findExecutable(process.execPath)).resolves.toBe(process.execPath);
    await expect(findExecutable(path.join(directory, 'nothing-here'))).resolves.toBeUndefined();
  });

  it('overrides the invocation with an executable path', async () => {
    const context = await createConverterContext({
      artifactsDirectory: directory,
      commandLinesFile: path.resolve(__dirname, '..', 'config', 'commandLines.json'),
      executablePath: '/opt/wk html/bin/wkhtmltopdf'
    });

    expect(context.commandRegistry.getCommand('wkhtmltopdf')).toBe('"/opt/wk html/bin/wkhtmltopdf"');
    expect(context.templates.isLoaded()).toBe(false);
  });
});
