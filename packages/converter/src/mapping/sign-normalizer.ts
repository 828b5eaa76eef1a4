/**
 * Quantity/price sign normalization
 *
 * The item net price (BT-146) must not be negative, so a negative line has to
 * carry its sign on the quantity. Sources encode negative lines with a negative
 * quantity, a negative price or both; this moves the sign where it belongs.
 */

import type { Amount, ConversionConfig, Quantity } from '@invoice-bridge/contracts';
import { isNegative, negate, type DiagnosticSink } from '@invoice-bridge/shared';

export interface LineSigns {
  lineExtensionNegative: boolean;
  quantity: Quantity;
  /**
   * Net price amount, when the line has one
   */
  price?: Amount;
}

export interface NormalizedLineSigns {
  quantity: Quantity;
  price?: Amount;
}

type SignAction = 'swap' | 'inconsistent' | 'keep';

function decide(lineExtensionNegative: boolean, quantityNegative: boolean, priceNegative: boolean | undefined): SignAction {
  if (priceNegative === undefined) {
    // Without a price only the quantity can carry the sign
    if (lineExtensionNegative) {
      return quantityNegative ? 'keep' : 'inconsistent';
    }
    return quantityNegative ? 'inconsistent' : 'keep';
  }

  if (lineExtensionNegative) {
    if (quantityNegative === priceNegative) {
      return 'inconsistent';
    }
    return priceNegative ? 'swap' : 'keep';
  }

  if (quantityNegative && priceNegative) {
    return 'swap';
  }
  return quantityNegative || priceNegative ? 'inconsistent' : 'keep';
}

export function normalizeQuantityAndPriceSigns(
  line: LineSigns,
  config: Pick<ConversionConfig, 'swapQuantitySignIfNeeded' | 'swapPriceSignIfNeeded'>,
  sink: DiagnosticSink,
  path: readonly string[],
): NormalizedLineSigns {
  const quantityNegative = isNegative(line.quantity.value);
  const priceNegative = line.price ? isNegative(line.price.value) : undefined;
  const action = decide(line.lineExtensionNegative, quantityNegative, priceNegative);
  const context = {
    lineExtensionNegative: line.lineExtensionNegative,
    quantity: line.quantity.value,
    price: line.price?.value,
  };

  if (action === 'inconsistent') {
    sink.warning(
      'SIGN-INCONSISTENT',
      'The signs of line extension amount, quantity and price are inconsistent',
      'ambiguity',
      { path, context },
    );
  }
  if (action !== 'swap') {
    return line.price ? { quantity: line.quantity, price: line.price } : { quantity: line.quantity };
  }

  let quantity = line.quantity;
  if (config.swapQuantitySignIfNeeded) {
    quantity = { ...quantity, value: negate(quantity.value) };
  } else {
    sink.info('SIGN-SWAP-DISABLED', 'Swapping the sign of the quantity is disabled', 'ambiguity', {
      path,
      context: { ...context, target: 'quantity' },
    });
  }

  let price = line.price;
  if (price) {
    if (config.swapPriceSignIfNeeded) {
      price = { ...price, value: negate(price.value) };
    } else {
      sink.info('SIGN-SWAP-DISABLED', 'Swapping the sign of the price is disabled', 'ambiguity', {
        path,
        context: { ...context, target: 'price' },
      });
    }
  }

  return price ? { quantity, price } : { quantity };
}
