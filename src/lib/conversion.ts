/**
 * Link conversion over a prepared tree.
 *
 * Like scanning, conversion is planned first and applied separately, so a
 * dry run shows exactly what a real run would write. Only the body of each
 * document is rewritten; the header is carried over byte for byte.
 */

import * as fs from "node:fs";
import { parseDocument } from "./frontmatter.js";
import { invertAssignments } from "./identifiers.js";
import { toFilePath } from "./location.js";
import type { Diagnostic, Location } from "./models.js";
import { convertToIdentifiers, type ReferenceChange } from "./rewriter.js";
import { scanTree } from "./scanner.js";

export interface ConversionOptions {
  idKey: string;
  extension: string;
  macro: string;
}

/**
 * A document whose links change.
 */
export interface ConvertedDocument {
  location: Location;
  /** Absolute path the document was read from */
  file?: string;
  changes: ReferenceChange[];
  content: string;
}

export interface ConversionPlan {
  documents: ConvertedDocument[];
  /** Scan diagnostics followed by reference diagnostics */
  diagnostics: Diagnostic[];
}

/**
 * Plan the conversion of every relative link under `docsDir` whose target
 * already carries an identifier.
 */
export function planConversion(docsDir: string, options: ConversionOptions): ConversionPlan {
  const { sources, plan } = scanTree(docsDir, {
    idKey: options.idKey,
    extension: options.extension,
    assign: false,
  });
  const byLocation = invertAssignments(plan.assignments);

  const diagnostics: Diagnostic[] = [...plan.diagnostics];
  const documents: ConvertedDocument[] = [];

  for (const source of sources) {
    const parsed = parseDocument(source.content);
    // Malformed headers were reported by the scan.
    if (!parsed.ok) continue;

    const { body } = parsed.document;
    const result = convertToIdentifiers(body, {
      location: source.location,
      identifierAt: (location) => byLocation.get(location),
      extension: options.extension,
      macro: options.macro,
    });
    diagnostics.push(...result.diagnostics);

    if (result.changes.length === 0) continue;

    const header = source.content.slice(0, source.content.length - body.length);
    documents.push({
      location: source.location,
      file: source.file,
      changes: result.changes,
      content: header + result.body,
    });
  }

  return { documents, diagnostics };
}

/**
 * Write converted documents. Returns the number of files written.
 */
export function applyConversion(docsDir: string, plan: ConversionPlan): number {
  for (const document of plan.documents) {
    fs.writeFileSync(document.file ?? toFilePath(docsDir, document.location), document.content);
  }
  return plan.documents.length;
}
