import type { StorageType } from '../../modules/dwf-mock/dwf-mock.config';

export interface HealthResponseDto {
  status: 'ok';
}

export interface ReadinessResponseDto {
  status: 'ready' | 'not_ready';
  checks: {
    store: boolean;
  };
  details: {
    storage: StorageType;
  };
}
