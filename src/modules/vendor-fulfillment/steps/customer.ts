import { isVendorApiError } from "../../../integrations/vendor/errors"
import { type MinimumQuantity, OfferType, VendorStatus } from "../../../integrations/vendor/types"
import { logStructured } from "../../logging/structured-logger"
import { FulfillmentParam, OrderingParam } from "../constants"
import { type CustomerData, type FulfillmentContext, type ValidationMode, getCustomerData } from "../context"
import {
  ERR_ADDRESS,
  ERR_CUSTOMER_DATA_MISSING,
  ERR_FIELD,
  ERR_VENDOR_ERROR,
  formatOrderError,
} from "../order-errors"
import { persistParameters, reportParameterError, switchOrderToFailed } from "../order-status"
import { setFulfillmentValue, setParameterValue, withParameters } from "../parameters"
import { type Step, StepResult } from "../pipeline"
import type { FulfillmentRuntime } from "../runtime"

const REQUIRED_CUSTOMER_FIELDS = [
  { parameter: OrderingParam.COMPANY_NAME, title: "company name" },
  { parameter: OrderingParam.ADDRESS, title: "address" },
  { parameter: OrderingParam.CONTACT, title: "contact" },
] as const

function missingCustomerField(data: CustomerData) {
  return REQUIRED_CUSTOMER_FIELDS.find(({ parameter }) => {
    switch (parameter) {
      case OrderingParam.COMPANY_NAME:
        return !data.companyName
      case OrderingParam.ADDRESS:
        return !data.address
      case OrderingParam.CONTACT:
        return !data.contact
    }
  })
}

/**
 * Fills company name, address and contact from the agreement's licensee
 * when the submitter left them empty.
 */
export class PrepareCustomerData implements Step {
  readonly name = "PrepareCustomerData"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    const licenseeId = context.order.agreement.licensee?.id
    const data = getCustomerData(context.order)
    if (context.vendorCustomerId || !licenseeId || !missingCustomerField(data)) {
      return StepResult.NEXT
    }

    const licensee = await runtime.marketplace.getLicensee(licenseeId)
    let parameters = context.order.parameters
    if (!data.companyName && licensee.name) {
      parameters = setParameterValue(parameters, "ordering", OrderingParam.COMPANY_NAME, licensee.name)
    }
    if (!data.address && licensee.address) {
      parameters = setParameterValue(parameters, "ordering", OrderingParam.ADDRESS, licensee.address)
    }
    if (!data.contact && licensee.contact) {
      parameters = setParameterValue(parameters, "ordering", OrderingParam.CONTACT, licensee.contact)
    }

    if (parameters !== context.order.parameters) {
      context.order = withParameters(context.order, parameters)
      await persistParameters(runtime, context)
    }

    return StepResult.NEXT
  }
}

export class ValidateCustomerData implements Step {
  readonly name = "ValidateCustomerData"
  private readonly mode: ValidationMode

  constructor(mode: ValidationMode = "validating") {
    this.mode = mode
  }

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    if (context.vendorCustomerId) {
      return StepResult.NEXT
    }

    const missing = missingCustomerField(getCustomerData(context.order))
    if (!missing) {
      return StepResult.NEXT
    }

    return reportParameterError(
      runtime,
      context,
      this.mode,
      missing.parameter,
      formatOrderError(ERR_CUSTOMER_DATA_MISSING, { title: missing.title }),
      { required: true }
    )
  }
}

function commitmentMinimums(data: CustomerData): MinimumQuantity[] | undefined {
  if (!data.commitmentRequested) {
    return undefined
  }

  const minimums: MinimumQuantity[] = []
  if (data.commitmentLicenses !== undefined) {
    minimums.push({ offerType: OfferType.LICENSE, quantity: data.commitmentLicenses })
  }
  if (data.commitmentConsumables !== undefined) {
    minimums.push({ offerType: OfferType.CONSUMABLES, quantity: data.commitmentConsumables })
  }
  return minimums
}

/**
 * Creates the vendor customer account for a first purchase and links it to
 * the order and the agreement. Field-level rejections send the order back
 * to the submitter.
 */
export class CreateCustomer implements Step {
  readonly name = "CreateCustomer"

  async run(runtime: FulfillmentRuntime, context: FulfillmentContext): Promise<StepResult> {
    if (context.vendorCustomerId) {
      return StepResult.NEXT
    }

    const data = getCustomerData(context.order)
    const { companyName, address, contact } = data
    if (!companyName || !address || !contact) {
      return new ValidateCustomerData("enforcing").run(runtime, context)
    }

    try {
      context.vendorCustomer = await runtime.vendor.createCustomerAccount({
        resellerId: runtime.config.vendor.resellerId ?? context.sellerId,
        agreementId: context.agreementId,
        marketSegment: context.marketSegment,
        companyName,
        preferredLanguage: data.preferredLanguage,
        address,
        contact,
        commitmentRequest: commitmentMinimums(data),
      })
    } catch (error) {
      if (!isVendorApiError(error)) {
        throw error
      }

      const details = error.details.join(", ") || error.message
      switch (error.code) {
        case VendorStatus.INVALID_FIELDS: {
          const onContact = error.details.some((detail) => detail.includes("contacts"))
          return reportParameterError(
            runtime,
            context,
            "enforcing",
            onContact ? OrderingParam.CONTACT : OrderingParam.COMPANY_NAME,
            formatOrderError(ERR_FIELD, { title: onContact ? "contact" : "company name", details })
          )
        }
        case VendorStatus.INVALID_ADDRESS:
          return reportParameterError(
            runtime,
            context,
            "enforcing",
            OrderingParam.ADDRESS,
            formatOrderError(ERR_ADDRESS, { details })
          )
        case VendorStatus.INVALID_MINIMUM_QUANTITY:
          return reportParameterError(
            runtime,
            context,
            "enforcing",
            [OrderingParam.COMMITMENT_LICENSES, OrderingParam.COMMITMENT_CONSUMABLES],
            formatOrderError(ERR_FIELD, { title: "3-year commitment minimum", details })
          )
        default:
          await switchOrderToFailed(
            runtime,
            context,
            formatOrderError(ERR_VENDOR_ERROR, { details: error.message })
          )
          return StepResult.HALT
      }
    }

    const customerId = context.vendorCustomer.customerId
    context.vendorCustomerId = customerId
    context.order = setFulfillmentValue(context.order, FulfillmentParam.CUSTOMER_ID, customerId)
    await persistParameters(runtime, context)
    await runtime.marketplace.updateAgreement(context.agreementId, {
      externalIds: { vendor: customerId },
    })

    logStructured(runtime.logger, "info", "vendor.customer.created", {
      order_id: context.orderId,
      agreement_id: context.agreementId,
      meta: { customer_id: customerId, commitment_requested: data.commitmentRequested },
    })

    return StepResult.NEXT
  }
}
