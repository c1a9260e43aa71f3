export const OrderingParam = {
  COMPANY_NAME: "companyName",
  ADDRESS: "address",
  CONTACT: "contact",
  PREFERRED_LANGUAGE: "preferredLanguage",
  AGREEMENT_TYPE: "agreementType",
  MEMBERSHIP_ID: "membershipId",
  COMMITMENT: "3YC",
  COMMITMENT_LICENSES: "3YCLicenses",
  COMMITMENT_CONSUMABLES: "3YCConsumables",
  RESELLER_CHANGE_CODE: "changeResellerCode",
  RESELLER_CHANGE_ADMIN_EMAIL: "changeResellerAdminEmail",
} as const

export type OrderingParam = (typeof OrderingParam)[keyof typeof OrderingParam]

export const FulfillmentParam = {
  DUE_DATE: "dueDate",
  RETRY_COUNT: "retryCount",
  CUSTOMER_ID: "customerId",
  COTERM_DATE: "cotermDate",
  NEXT_SYNC: "nextSync",
  COMMITMENT_REQUEST_STATUS: "3YCCommitmentRequestStatus",
  COMMITMENT_ENROLL_STATUS: "3YCEnrollStatus",
  COMMITMENT_START_DATE: "3YCStartDate",
  COMMITMENT_END_DATE: "3YCEndDate",
  VENDOR_SKU: "vendorSku",
} as const

export type FulfillmentParam = (typeof FulfillmentParam)[keyof typeof FulfillmentParam]

export const AgreementType = {
  NEW: "New",
  MIGRATE: "Migrate",
  TRANSFER: "Transfer",
} as const

export const MarketplaceOrderType = {
  PURCHASE: "Purchase",
  CHANGE: "Change",
  TERMINATION: "Termination",
  CONFIGURATION: "Configuration",
} as const

export const TemplateName = {
  PURCHASE_PROCESSING: "Purchase processing",
  PURCHASE_COMPLETED: "Purchase completed",
  CHANGE_PROCESSING: "Change processing",
  CHANGE_COMPLETED: "Change completed",
  TERMINATION_PROCESSING: "Termination processing",
  TERMINATION_COMPLETED: "Termination completed",
  TRANSFER_PROCESSING: "Transfer processing",
  TRANSFER_COMPLETED: "Transfer completed",
  RESELLER_CHANGE_PROCESSING: "Reseller change processing",
  RESELLER_CHANGE_COMPLETED: "Reseller change completed",
  CONFIGURATION_PROCESSING: "Configuration processing",
  AUTO_RENEWAL_ENABLED: "Auto-renewal enabled",
  AUTO_RENEWAL_DISABLED: "Auto-renewal disabled",
  QUERYING: "Order querying",
} as const

export const COMMITMENT_BENEFIT_TYPE = "THREE_YEAR_COMMIT"
export const MIN_COMMITMENT_LICENSES = 10
export const MIN_COMMITMENT_CONSUMABLES = 1000
export const DEFAULT_PREFERRED_LANGUAGE = "en-US"
export const MarketSegment = {
  COMMERCIAL: "COM",
  EDUCATION: "EDU",
  GOVERNMENT: "GOV",
  LARGE_GOVERNMENT_AGENCY: "LGA",
} as const

export type MarketSegment = (typeof MarketSegment)[keyof typeof MarketSegment]

export const DEFAULT_MARKET_SEGMENT: MarketSegment = MarketSegment.COMMERCIAL

/** Downsizes this close to the anniversary only lower the renewal quantity. */
export const LAST_TWO_WEEKS_DAYS = 14
