import { Injectable } from '@nestjs/common';
import { SERVICE_VERSION } from './modules/licenses/licenses.service';

@Injectable()
export class AppService {
  getRoot() {
    return {
      success: true,
      message: 'License Activation Server',
      version: SERVICE_VERSION,
      endpoints: {
        Licenses: {
          'Validate License': 'POST /api/license/validate',
          'Generate License (admin)': 'POST /api/license/generate',
          'Bulk Generate Licenses (admin)': 'POST /api/license/generate/bulk',
          'Deactivate License (admin)': 'POST /api/license/deactivate',
          'License Storage Health': 'GET /api/license/health',
        },
      },
    };
  }
}
