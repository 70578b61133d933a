import { Injectable } from '@nestjs/common';
import {
  SERVICE_NAME,
  SERVICE_VERSION,
  SUPPORTED_LANGUAGES,
} from './quadrant/config/quadrant.constants';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string; languages: string[] } {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      languages: [...SUPPORTED_LANGUAGES],
    };
  }

  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }
}
