import type { Order } from "../../integrations/marketplace/types"
import { validationError } from "../observability/errors"
import { AgreementType, MarketplaceOrderType, OrderingParam } from "./constants"
import { OrderType } from "./context"
import { getOrderingText } from "./parameters"

/**
 * Purchases double as membership transfers and reseller changes, told apart
 * by the agreement type the submitter picked.
 */
export function resolveOrderType(order: Order): OrderType {
  switch (order.type) {
    case MarketplaceOrderType.PURCHASE: {
      const agreementType = getOrderingText(order, OrderingParam.AGREEMENT_TYPE)
      if (agreementType === AgreementType.MIGRATE) {
        return OrderType.TRANSFER
      }
      if (agreementType === AgreementType.TRANSFER) {
        return OrderType.RESELLER_CHANGE
      }
      return OrderType.PURCHASE
    }
    case MarketplaceOrderType.CHANGE:
      return OrderType.CHANGE
    case MarketplaceOrderType.TERMINATION:
      return OrderType.TERMINATION
    case MarketplaceOrderType.CONFIGURATION:
      return OrderType.CONFIGURATION
    default:
      throw validationError("UNSUPPORTED_ORDER_TYPE", `Order type "${order.type}" is not supported.`, {
        details: { order_id: order.id, type: order.type },
      })
  }
}
