/**
 * Injection tokens for the DWF mock module
 */

export const PAYLOAD_STORE = Symbol('PAYLOAD_STORE');
export const DWF_MOCK_CONFIG = Symbol('DWF_MOCK_CONFIG');
