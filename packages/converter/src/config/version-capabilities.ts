import type { UblVersion } from '@invoice-bridge/contracts';

/**
 * Where BT-9 (payment due date) goes on a CreditNote
 */
export type CreditNoteDueDatePlacement = 'header' | 'payment-means';

/**
 * The points where the UBL target versions differ. Everything else is
 * mapped identically for all versions.
 */
export interface VersionCapabilities {
  /**
   * A credit transfer without payee account is dropped entirely (true) or
   * kept without the account sub-block (false)
   */
  creditTransferRequiresAccount: boolean;

  /**
   * PartyLegalEntity/CompanyLegalForm may repeat
   */
  multipleCompanyLegalForms: boolean;

  creditNoteDueDate: CreditNoteDueDatePlacement;

  /**
   * CreditNote has cac:ProjectReference
   */
  creditNoteProjectReference: boolean;
}

export const VERSION_CAPABILITIES: Readonly<Record<UblVersion, Readonly<VersionCapabilities>>> = {
  '2.1': {
    creditTransferRequiresAccount: false,
    multipleCompanyLegalForms: false,
    creditNoteDueDate: 'payment-means',
    creditNoteProjectReference: false,
  },
  '2.2': {
    creditTransferRequiresAccount: false,
    multipleCompanyLegalForms: false,
    creditNoteDueDate: 'header',
    creditNoteProjectReference: true,
  },
  '2.3': {
    creditTransferRequiresAccount: true,
    multipleCompanyLegalForms: true,
    creditNoteDueDate: 'payment-means',
    creditNoteProjectReference: true,
  },
  '2.4': {
    creditTransferRequiresAccount: true,
    multipleCompanyLegalForms: true,
    creditNoteDueDate: 'payment-means',
    creditNoteProjectReference: true,
  },
};

export function getVersionCapabilities(version: UblVersion): Readonly<VersionCapabilities> {
  return VERSION_CAPABILITIES[version];
}
