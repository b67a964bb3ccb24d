import { Router } from 'express';

import { exportDailyTable } from '../controllers/export';

const router = Router();

router.post('/', exportDailyTable);

export default router;
