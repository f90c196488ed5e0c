import { JsonObject, WebhookEndpoint } from '../../core';

/**
 * Factory for sample webhook payloads
 * Field names follow what the DWF handlers read from each message kind
 */
export class SamplePayloads {
  private static counter = 0;

  /**
   * Imaging Availability Notification
   */
  static ian(options: SamplePayloadOptions = {}): JsonObject {
    return {
      ian_id: options.id ?? this.generateId('IAN'),
      source: 'ORTHANC',
      sop_instance_uids: ['1.2.3.4.5.1', '1.2.3.4.5.2'],
      availability_status: 'Available',
      timestamp: '2025-01-15T09:30:00Z',
      patient_id: options.patientId ?? 'P001',
      accession_number: 'ACC-0001',
      ...options.overrides,
    };
  }

  /**
   * Modality Performed Procedure Step
   */
  static mpps(options: SamplePayloadOptions = {}): JsonObject {
    return {
      pps_uid: options.id ?? this.generateId('MPPS'),
      sps_uid: 'SPS-0001',
      rp_id: 'RP-0001',
      actor: 'CT-SCANNER-1',
      status: 'COMPLETED',
      instance_uids: ['1.2.3.4.5.1'],
      patient_id: options.patientId ?? 'P001',
      ...options.overrides,
    };
  }

  /**
   * Unified Procedure Step
   */
  static ups(options: SamplePayloadOptions = {}): JsonObject {
    return {
      ups_id: options.id ?? this.generateId('UPS'),
      rp_id: 'RP-0001',
      ups_status: 'SCHEDULED',
      actor: 'READING-ROOM-1',
      patient_id: options.patientId ?? 'P001',
      study_uid: '1.2.3',
      ...options.overrides,
    };
  }

  static forEndpoint(
    endpoint: WebhookEndpoint,
    options: SamplePayloadOptions = {},
  ): JsonObject {
    switch (endpoint) {
      case WebhookEndpoint.RECEIVE_IAN:
        return this.ian(options);
      case WebhookEndpoint.CREATE_PPS:
        return this.mpps(options);
      case WebhookEndpoint.CREATE_UPS:
        return this.ups(options);
    }
  }

  private static generateId(prefix: string): string {
    return `${prefix}-TEST-${String(++this.counter).padStart(4, '0')}`;
  }
}

export interface SamplePayloadOptions {
  id?: string;
  patientId?: string;
  overrides?: JsonObject;
}
