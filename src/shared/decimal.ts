/**
 * Decimal — safe financial math facade.
 *
 * All prices, quantities, balances and revenue use Decimal; raw `number`
 * never carries money. The implementation lives in lib/decimal so the
 * third-party dependency stays behind one import path.
 */

export { LibDecimal as Decimal } from "../lib/decimal/index.js";
