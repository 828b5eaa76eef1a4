/**
 * CII document detection
 *
 * Checks that XML content is a CrossIndustryInvoice without a full parse. No
 * invoice content is extracted beyond the guideline identifier.
 */

import { createDiagnostic } from '@invoice-bridge/shared';
import type { Diagnostic } from '@invoice-bridge/contracts';
import type { CiiDetectionResult } from './types.js';
import { CII_NAMESPACES } from './types.js';

export const READER_SOURCE = 'cii-reader';

interface RootInfo {
  rootElement: string;
  localName: string;
  prefix?: string;
}

/**
 * Detect whether XML content is a CII invoice.
 *
 * @example
 * const detection = detectCiiDocument(xml);
 * if (!detection.isCii) return detection.diagnostics;
 */
export function detectCiiDocument(xml: string): CiiDetectionResult {
  if (!xml || xml.trim().length === 0) {
    return {
      isCii: false,
      diagnostics: [formatError('CII-EMPTY-INPUT', 'Empty XML content')],
    };
  }

  const trimmedXml = xml.trim();
  if (!trimmedXml.startsWith('<')) {
    return {
      isCii: false,
      diagnostics: [formatError('CII-NOT-XML', 'Content does not appear to be XML')],
    };
  }

  const rootInfo = extractRootInfo(trimmedXml);
  if (!rootInfo) {
    return {
      isCii: false,
      diagnostics: [formatError('CII-NOT-XML', 'No root element found')],
    };
  }

  if (rootInfo.localName !== 'CrossIndustryInvoice') {
    return {
      isCii: false,
      rootElement: rootInfo.rootElement,
      diagnostics: [
        formatError('CII-UNSUPPORTED-ROOT', `Unsupported root element '${rootInfo.rootElement}'`, {
          rootElement: rootInfo.rootElement,
        }),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const namespaces = extractNamespaces(trimmedXml);
  const rootNamespace = namespaces.get(rootInfo.prefix ?? '');

  const result: CiiDetectionResult = {
    isCii: true,
    rootElement: rootInfo.rootElement,
    diagnostics,
  };

  if (rootNamespace) {
    result.namespace = rootNamespace;
    if (rootNamespace !== CII_NAMESPACES.RSM) {
      diagnostics.push(
        createDiagnostic(
          READER_SOURCE,
          'warning',
          'CII-UNEXPECTED-NAMESPACE',
          `Root element namespace '${rootNamespace}' is not the CII D16B namespace`,
          'format',
          { context: { namespace: rootNamespace } },
        ),
      );
    }
  }

  const guidelineId = extractGuidelineId(trimmedXml);
  if (guidelineId) {
    result.guidelineId = guidelineId;
  }

  return result;
}

// Processing instructions (the XML declaration included), comments and DOCTYPE, in any order
const PROLOG_ITEM = /^(?:<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^>[]*(?:\[[\s\S]*?\])?\s*>)\s*/;

/**
 * Extract root element info, skipping everything the prolog may contain
 */
function extractRootInfo(xml: string): RootInfo | null {
  let rest = xml;
  let prologItem = PROLOG_ITEM.exec(rest);
  while (prologItem) {
    rest = rest.slice(prologItem[0].length);
    prologItem = PROLOG_ITEM.exec(rest);
  }

  const elementMatch = /^<([a-zA-Z_][\w.-]*(?::[a-zA-Z_][\w.-]*)?)/.exec(rest);
  if (!elementMatch?.[1]) {
    return null;
  }

  const fullName = elementMatch[1];
  const parts = fullName.split(':');

  if (parts.length === 2 && parts[0] && parts[1]) {
    return {
      rootElement: fullName,
      localName: parts[1],
      prefix: parts[0],
    };
  }

  return {
    rootElement: fullName,
    localName: fullName,
  };
}

/**
 * Extract namespace declarations (prefix -> URI; '' for the default namespace)
 */
function extractNamespaces(xml: string): Map<string, string> {
  const namespaces = new Map<string, string>();

  const nsRegex = /xmlns(?::([a-zA-Z_][\w.-]*))?="([^"]*)"/g;
  let match: RegExpExecArray | null;

  while ((match = nsRegex.exec(xml)) !== null) {
    const prefix = match[1] ?? '';
    if (!namespaces.has(prefix)) {
      namespaces.set(prefix, match[2] ?? '');
    }
  }

  return namespaces;
}

/**
 * Extract GuidelineSpecifiedDocumentContextParameter/ID (simple pattern matching)
 */
function extractGuidelineId(xml: string): string | undefined {
  const pattern =
    /<(?:[\w.-]+:)?GuidelineSpecifiedDocumentContextParameter[^>]*>[\s\S]*?<(?:[\w.-]+:)?ID[^>]*>([^<]+)<\/(?:[\w.-]+:)?ID>/;
  const match = pattern.exec(xml);
  return match?.[1]?.trim();
}

function formatError(code: string, message: string, context?: Record<string, unknown>): Diagnostic {
  return createDiagnostic(READER_SOURCE, 'error', code, message, 'format', context ? { context } : undefined);
}
