import BigNumber from "bignumber.js";

/**
 * 统一使用 BigNumber 表示行情数值，按接口原值透传，避免浮点误差。
 */
export const Decimal = BigNumber;
