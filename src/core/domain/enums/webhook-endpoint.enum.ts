/**
 * Ingestion webhooks served by the mock, named after the frappe_dwf
 * whitelisted methods they stand in for
 */
export enum WebhookEndpoint {
  /**
   * Imaging Availability Notification from the PACS
   */
  RECEIVE_IAN = 'receive_ian',

  /**
   * Modality Performed Procedure Step creation
   */
  CREATE_PPS = 'create_pps',

  /**
   * Unified Procedure Step creation
   */
  CREATE_UPS = 'create_ups',
}
