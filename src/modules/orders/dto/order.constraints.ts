/**
 * Validation thresholds for order payloads, per API version
 */
export const ORDER_V1_CUSTOMER_NAME_MIN_LENGTH = 2;
export const ORDER_V1_CUSTOMER_NAME_MAX_LENGTH = 100;
export const ORDER_V1_MAX_QUANTITY = 1000;

export const ORDER_V2_MAX_QUANTITY = 10000;
export const ORDER_V2_SKU_PATTERN = /^[A-Z]{3}-\d{4}$/;
