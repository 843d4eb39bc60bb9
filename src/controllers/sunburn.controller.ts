import { Request, Response } from 'express';
import { ISunburnRequest } from '@/types';
import { SunburnService } from '@/services/sunburn.service';
import { SKIN_TYPES } from '@/config/model';
import { RISK_CSV_FILENAME } from '@/utils/csv';

export class SunburnController {
  constructor(private sunburnService: SunburnService) {}

  async getAssessment(req: Request, res: Response) {
    const request: ISunburnRequest = req.body;
    const result = await this.sunburnService.assess(request);
    res.json(result);
  }

  async exportCsv(req: Request, res: Response) {
    const request: ISunburnRequest = req.body;
    const csv = await this.sunburnService.exportCsv(request);
    res.attachment(RISK_CSV_FILENAME);
    res.type('text/csv');
    res.send(csv);
  }

  listSkinTypes(req: Request, res: Response) {
    res.json(SKIN_TYPES);
  }
}
