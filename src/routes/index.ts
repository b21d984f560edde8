import { Router } from 'express';
import healthRoutes from './health.routes';
import namesRoutes from './names.routes';

const router = Router();

// Health check routes
router.use('/health', healthRoutes);

// Name matching routes (search + lookup tables)
router.use('/names', namesRoutes);

export default router;
