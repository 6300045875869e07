export const PARAM_URL = '#{url}';
export const PARAM_TARGET_FILE_PATH = '#{targetFilePath}';

export interface ConvertCommandOptions {
  executable: string;
  template: string;
  url: string;
  targetFilePath: string;
  cookieJarPath?: string;
}

export interface LoginCommandOptions {
  executable: string;
  cookieJarPath: string;
  /**
   * Raw wkhtmltopdf arguments posting the login form, for example
   * `--post user_name THE_LOGIN --post user-pwd THE_PWD --post Submit doLogin`.
   * Appended as is: the caller is responsible for its content.
   */
  loginInfo: string;
  url: string;
  targetFilePath: string;
}

export function substituteParameters(template: string, values: { url: string; targetFilePath: string }): string {
  // split/join rather than String#replace so `$` sequences in a URL stay literal
  return template
    .split(PARAM_URL)
    .join(values.url)
    .split(PARAM_TARGET_FILE_PATH)
    .join(values.targetFilePath);
}

export function buildConvertParameters(options: Omit<ConvertCommandOptions, 'executable'>): string {
  let params = options.template;

  if (options.cookieJarPath) {
    params = `--cookie-jar "${options.cookieJarPath}" ${params}`;
  }

  return substituteParameters(params, { url: options.url, targetFilePath: options.targetFilePath });
}

export function buildConvertCommand(options: ConvertCommandOptions): string {
  return `${options.executable} ${buildConvertParameters(options)}`;
}

export function buildLoginCommand(options: LoginCommandOptions): string {
  let line = `${options.executable} -q --cookie-jar "${options.cookieJarPath}"`;
  line += ` ${options.loginInfo}`;
  line += ` "${options.url}"`;
  line += ` "${options.targetFilePath}"`;
  return line;
}

/**
 * Quotes an executable path containing whitespace so it survives {@link parseCommandLine}.
 */
export function quoteExecutable(executable: string): string {
  if (/\s/.test(executable) && !/^["'].*["']$/.test(executable)) {
    return `"${executable}"`;
  }
  return executable;
}

/**
 * Splits a command line into its arguments. Single and double quotes group
 * words and are dropped; there is no backslash escaping.
 */
export function parseCommandLine(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | undefined;
  let quotedToken = false;

  for (const char of line) {
    if (quote) {
      if (char === quote) {
        quote = undefined;
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      quotedToken = true;
    } else if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
      if (current || quotedToken) {
        args.push(current);
      }
      current = '';
      quotedToken = false;
    } else {
      current += char;
    }
  }

  if (quote) {
    throw new Error(`Unbalanced quotes in ${line}`);
  }

  if (current || quotedToken) {
    args.push(current);
  }

  return args;
}
