export type LinkDiagnosticCode = 'AMBIGUOUS_MAPPING' | 'UNALIGNED_COLUMN_LINK';

/**
 * Non-fatal condition found while building or reading links.
 */
export interface LinkDiagnostic {
  code: LinkDiagnosticCode;
  message: string;
  details?: Record<string, unknown>;
}

export type DiagnosticSink = (diagnostic: LinkDiagnostic) => void;

export const consoleDiagnosticSink: DiagnosticSink = (diagnostic) => {
  console.warn(`[${diagnostic.code}] ${diagnostic.message}`);
};
