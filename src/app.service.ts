import { Injectable } from '@nestjs/common';
import {
  NARRATIVE_STORE_DRIVER,
  SERVICE_NAME,
} from './narrative/config/narrative.constants';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string; storeDriver: string } {
    return {
      service: SERVICE_NAME,
      version: '1.0.0',
      storeDriver: NARRATIVE_STORE_DRIVER,
    };
  }

  getHealth(): { status: string; service: string } {
    return { status: 'ok', service: SERVICE_NAME };
  }
}
