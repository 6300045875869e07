import {
  buildConvertCommand,
  buildConvertParameters,
  buildLoginCommand,
  parseCommandLine,
  quoteExecutable,
  substituteParameters
} from '../src/services/commandBuilder';

describe('command builder', () => {
  it('substitutes the url and target file placeholders', () => {
    const params = buildConvertParameters({
      template: '#{url} -> #{targetFilePath}',
      url: 'http://example.com',
      targetFilePath: '/tmp/out.pdf'
    });

    expect(params).toBe('http://example.com -> /tmp/out.pdf');
  });

  it('prefixes the command with the renderer invocation', () => {
    const line = buildConvertCommand({
      executable: 'wkhtmltopdf',
      template: '-q "#{url}" "#{targetFilePath}"',
      url: 'http://example.com',
      targetFilePath: '/tmp/out.pdf'
    });

    expect(line).toBe('wkhtmltopdf -q "http://example.com" "/tmp/out.pdf"');
  });

  it('puts the cookie jar before the substituted template', () => {
    const line = buildConvertCommand({
      executable: 'wkhtmltopdf',
      template: '#{url} -> #{targetFilePath}',
      url: 'http://example.com',
      targetFilePath: '/tmp/out.pdf',
      cookieJarPath: '/tmp/jar1'
    });

    expect(line).toBe('wkhtmltopdf --cookie-jar "/tmp/jar1" http://example.com -> /tmp/out.pdf');
  });

  it('replaces every occurrence and keeps dollar signs literal', () => {
    expect(substituteParameters('#{url} #{url}', { url: 'http://example.com/$&', targetFilePath: '/tmp/x.pdf' }))
      .toBe('http://example.com/$& http://example.com/$&');
  });

  it('builds the login command with the raw form arguments', () => {
    const line = buildLoginCommand({
      executable: 'wkhtmltopdf',
      cookieJarPath: '/tmp/session.jar',
      loginInfo: '--post user x --post pass y',
      url: 'http://example.com/login',
      targetFilePath: '/tmp/ignored.pdf'
    });

    expect(line).toBe(
      'wkhtmltopdf -q --cookie-jar "/tmp/session.jar" --post user x --post pass y "http://example.com/login" "/tmp/ignored.pdf"'
    );
  });

  it('quotes executables containing spaces', () => {
    expect(quoteExecutable('/opt/wk html/bin/wkhtmltopdf')).toBe('"/opt/wk html/bin/wkhtmltopdf"');
    expect(quoteExecutable('wkhtmltopdf')).toBe('wkhtmltopdf');
    expect(quoteExecutable('"/opt/a b/wk"')).toBe('"/opt/a b/wk"');
  });
});

describe('parseCommandLine', () => {
  it('splits on whitespace and honours quotes', () => {
    expect(parseCommandLine('wkhtmltopdf  -q "a b" \'c d\' e'))
      .toEqual(['wkhtmltopdf', '-q', 'a b', 'c d', 'e']);
  });

  it('keeps empty quoted arguments', () => {
    expect(parseCommandLine('tool "" x')).toEqual(['tool', '', 'x']);
  });

  it('joins quoted and unquoted parts of one word', () => {
    expect(parseCommandLine('tool --opt="a b"')).toEqual(['tool', '--opt=a b']);
  });

  it('rejects unbalanced quotes', () => {
    expect(() => parseCommandLine('tool "http://example.com')).toThrow('Unbalanced quotes in tool "http://example.com');
  });
});
