/**
 * Canonical formatting for generated TypeScript.
 *
 * Text with syntax errors is returned unchanged with ok=false so callers can
 * still emit it and report the problem separately.
 */

import ts from 'typescript';

export interface FormatResult {
  text: string;
  ok: boolean;
  error?: string;
}

export function formatSource(text: string, fileName = 'generated.ts'): FormatResult {
  const { diagnostics = [] } = ts.transpileModule(text, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.ESNext },
  });

  const errors = diagnostics.filter(d => d.category === ts.DiagnosticCategory.Error);
  if (errors.length > 0) {
    return { text, ok: false, error: errors.map(describeDiagnostic).join('\n') };
  }

  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  return { text: printer.printFile(sourceFile), ok: true };
}

function describeDiagnostic(d: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(d.messageText, '\n');
  if (d.file && d.start !== undefined) {
    const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
    return `${d.file.fileName}:${line + 1}:${character + 1}: ${message}`;
  }
  return message;
}
