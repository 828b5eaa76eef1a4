/**
 * Document references: order, billing, despatch, receipt, originator,
 * contract, additional and project references.
 */

import type {
  CiiDocument,
  CiiHeaderTradeAgreement,
  CiiReferencedDocument,
  Text,
  UblBillingReference,
  UblDocumentReference,
  UblOrderReference,
} from '@invoice-bridge/contracts';
import { assignDefined } from '@invoice-bridge/shared';
import type { MappingContext } from '../mapping/context.js';
import { parseDateTime } from '../mapping/dates.js';
import { copyText, valueOf } from '../mapping/primitives.js';

/**
 * UNTDID 1001 codes that survive as DocumentTypeCode:
 * 50 tender or lot, 130 invoiced object, 916 supporting document
 */
const KEPT_DOCUMENT_TYPE_CODES: ReadonlySet<string> = new Set(['50', '130', '916']);

const TENDER_OR_LOT_TYPE_CODE = '50';

/**
 * Absent when the source has no issuer assigned id
 */
export function convertDocumentReference(
  source: CiiReferencedDocument | undefined,
  ctx: MappingContext,
  path: readonly string[],
): UblDocumentReference | undefined {
  const id = valueOf(source?.issuerAssignedId);
  if (!source || id === undefined) {
    return undefined;
  }

  const reference: UblDocumentReference = {
    id: { value: id },
    documentDescriptions: source.names
      .map(copyText)
      .filter((text): text is Text => text !== undefined),
  };
  assignDefined(reference.id, 'schemeId', valueOf(source.referenceTypeCode));
  assignDefined(reference, 'issueDate', parseDateTime(source.formattedIssueDateTime, ctx.sink, [...path, 'FormattedIssueDateTime']));

  const typeCode = valueOf(source.typeCode)?.trim();
  if (typeCode !== undefined && KEPT_DOCUMENT_TYPE_CODES.has(typeCode)) {
    reference.documentTypeCode = typeCode;
  }

  const binaryObject = source.attachmentBinaryObjects.find((object) => object.value.length > 0);
  const uri = valueOf(source.uriId);
  if (binaryObject || uri !== undefined) {
    reference.attachment = {};
    assignDefined(reference.attachment, 'embeddedDocumentBinaryObject', binaryObject ? { ...binaryObject } : undefined);
    assignDefined(reference.attachment, 'externalReferenceUri', uri);
  }
  return reference;
}

/**
 * OrderReference needs an ID; a seller order alone gets the configured placeholder
 */
export function convertOrderReference(
  agreement: CiiHeaderTradeAgreement,
  ctx: MappingContext,
): UblOrderReference | undefined {
  const buyerOrderId = valueOf(agreement.buyerOrder?.issuerAssignedId);
  const sellerOrderId = valueOf(agreement.sellerOrder?.issuerAssignedId);
  if (buyerOrderId === undefined && sellerOrderId === undefined) {
    return undefined;
  }
  const reference: UblOrderReference = { id: buyerOrderId ?? ctx.config.defaultOrderReferenceId };
  assignDefined(reference, 'salesOrderId', sellerOrderId);
  return reference;
}

export interface DocumentReferences {
  orderReference?: UblOrderReference;
  billingReferences: UblBillingReference[];
  despatchDocumentReferences: UblDocumentReference[];
  receiptDocumentReferences: UblDocumentReference[];
  originatorDocumentReferences: UblDocumentReference[];
  contractDocumentReferences: UblDocumentReference[];
  additionalDocumentReferences: UblDocumentReference[];
  projectReferences: string[];
}

function listOf(reference: UblDocumentReference | undefined): UblDocumentReference[] {
  return reference ? [reference] : [];
}

/**
 * Only called once the mandatory transaction blocks are known to exist
 */
export function convertDocumentReferences(
  source: CiiDocument,
  agreement: CiiHeaderTradeAgreement,
  ctx: MappingContext,
  paths: { agreement: readonly string[]; delivery: readonly string[]; settlement: readonly string[] },
): DocumentReferences {
  const delivery = source.transaction?.delivery;
  const settlement = source.transaction?.settlement;

  const references: DocumentReferences = {
    billingReferences: [],
    despatchDocumentReferences: listOf(
      convertDocumentReference(delivery?.despatchAdvice, ctx, [...paths.delivery, 'DespatchAdviceReferencedDocument']),
    ),
    receiptDocumentReferences: listOf(
      convertDocumentReference(delivery?.receivingAdvice, ctx, [...paths.delivery, 'ReceivingAdviceReferencedDocument']),
    ),
    originatorDocumentReferences: [],
    contractDocumentReferences: listOf(
      convertDocumentReference(agreement.contract, ctx, [...paths.agreement, 'ContractReferencedDocument']),
    ),
    additionalDocumentReferences: [],
    projectReferences: [],
  };
  assignDefined(references, 'orderReference', convertOrderReference(agreement, ctx));

  const invoiceReference = convertDocumentReference(
    settlement?.invoiceReferencedDocument,
    ctx,
    [...paths.settlement, 'InvoiceReferencedDocument'],
  );
  if (invoiceReference) {
    references.billingReferences.push({ invoiceDocumentReference: invoiceReference });
  }

  const additionalPath = [...paths.agreement, 'AdditionalReferencedDocument'];
  for (const additional of agreement.additionalReferencedDocuments) {
    const reference = convertDocumentReference(additional, ctx, additionalPath);
    if (!reference) {
      continue;
    }
    if (valueOf(additional.typeCode)?.trim() === TENDER_OR_LOT_TYPE_CODE) {
      // Tender or lot reference (BT-17) has no type code in UBL
      delete reference.documentTypeCode;
      references.originatorDocumentReferences.push(reference);
    } else {
      references.additionalDocumentReferences.push(reference);
    }
  }

  const projectId = valueOf(agreement.procuringProject?.id);
  if (projectId !== undefined) {
    references.projectReferences.push(projectId);
  }
  return references;
}
