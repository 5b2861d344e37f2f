export interface ConfigDiagnostic {
  summary: string
  detail: string
}

export class ConfigValidationError extends Error {
  readonly diagnostics: readonly ConfigDiagnostic[]

  constructor(diagnostics: ConfigDiagnostic[]) {
    super(diagnostics.map(formatDiagnostic).join('\n'))
    this.name = 'ConfigValidationError'
    this.diagnostics = Object.freeze([...diagnostics])
  }
}

export function formatDiagnostic(diag: ConfigDiagnostic): string {
  return `${diag.summary}: ${diag.detail}`
}
