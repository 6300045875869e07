import type { FileArtifact } from './artifactStore';
import { runAndVerify, type PdfInspector } from './boundedExecutor';
import { buildConvertCommand, buildLoginCommand } from './commandBuilder';
import type { ConverterContext } from './converterContext';

export const DEFAULT_TIMEOUT_MS = 30000;
export const MIN_TIMEOUT_MS = 1000;

export interface WebpageConverterOptions {
  timeoutMs?: number;
  inspect?: PdfInspector;
}

function defaultFileName(url: string): string {
  try {
    const { hostname } = new URL(url);
    if (hostname) {
      return `${hostname}.pdf`;
    }
  } catch (_error) {
    // not a URL the WHATWG parser accepts, the renderer will decide
  }
  return 'webpage.pdf';
}

function ensurePdfExtension(fileName: string): string {
  return fileName.toLowerCase().endsWith('.pdf') ? fileName : `${fileName}.pdf`;
}

/**
 * Converts distant webpages to PDF with wkhtmltopdf.
 *
 * Some pages make wkhtmltopdf freeze, so every run is bounded by a timeout
 * after which the process is killed. The exit code is never trusted: the
 * produced PDF is parsed and must have at least one page.
 */
export class WebpageConverter {
  private timeoutMs = DEFAULT_TIMEOUT_MS;

  constructor(private readonly context: ConverterContext, private readonly options: WebpageConverterOptions = {}) {
    this.setTimeout(options.timeoutMs ?? 0);
  }

  /**
   * Values below one second are replaced by {@link DEFAULT_TIMEOUT_MS}.
   */
  setTimeout(milliseconds: number): void {
    this.timeoutMs = Number.isFinite(milliseconds) && milliseconds >= MIN_TIMEOUT_MS ? milliseconds : DEFAULT_TIMEOUT_MS;
  }

  getTimeout(): number {
    return this.timeoutMs;
  }

  getCommandName(): string {
    return this.context.commandName;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const availability = await this.context.commandRegistry.getCommandAvailability(this.context.commandName);
      return availability.available;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`Unable to check availability of "${this.context.commandName}": ${message}`);
      return false;
    }
  }

  async convert(url: string, outputFileName?: string, cookieJar?: FileArtifact): Promise<FileArtifact> {
    const template = this.context.templates.get();
    const fileName = ensurePdfExtension(outputFileName?.trim() || defaultFileName(url));
    const resultPdf = await this.context.artifactStore.create('.pdf', fileName);

    const commandLine = buildConvertCommand({
      executable: this.context.commandRegistry.getCommand(this.context.commandName),
      template,
      url,
      targetFilePath: resultPdf.path,
      cookieJarPath: cookieJar?.path
    });

    return this.run(commandLine, resultPdf);
  }

  /**
   * Posts a login form and returns the cookie jar to pass to later
   * {@link convert} calls. `loginInfo` holds the `--post` arguments, e.g.
   * `--post user_name THE_LOGIN --post user-pwd THE_PWD --post Submit doLogin`.
   */
  async login(url: string, loginInfo: string): Promise<FileArtifact> {
    const cookieJar = await this.context.artifactStore.create('.jar');
    const ignoredPdf = await this.context.artifactStore.create('.pdf');

    const commandLine = buildLoginCommand({
      executable: this.context.commandRegistry.getCommand(this.context.commandName),
      cookieJarPath: cookieJar.path,
      loginInfo,
      url,
      targetFilePath: ignoredPdf.path
    });

    await this.run(commandLine, ignoredPdf);

    return cookieJar;
  }

  private run(commandLine: string, resultPdf: FileArtifact): Promise<FileArtifact> {
    return runAndVerify(commandLine, resultPdf, { timeoutMs: this.timeoutMs, inspect: this.options.inspect });
  }
}
