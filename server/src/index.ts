import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { errorHandler } from './middleware/error-handler';
import { toolpathRouter } from './routes/toolpath.routes';

const app: Express = express();
const httpServer = createServer(app);
const PORT = process.env.PORT || 3001;

// Middleware
app.use(cors());
app.use(express.json({ limit: '50mb' }));
app.use(express.urlencoded({ extended: true, limit: '50mb' }));

// Routes
app.use('/api/toolpath', toolpathRouter);

// Health check
app.get('/api/health', (req: Request, res: Response) => {
  res.json({ status: 'ok', message: 'Toolpath API is running' });
});

// Error handling middleware
app.use(errorHandler);

process.on('SIGTERM', () => {
  console.log('SIGTERM received, closing server...');
  httpServer.close(() => process.exit(0));
});

process.on('SIGINT', () => {
  console.log('SIGINT received, closing server...');
  httpServer.close(() => process.exit(0));
});

// Start server
httpServer.listen(PORT, () => {
  console.log(`⚡️ Server is running on port ${PORT}`);
  console.log(`🛠️  Toolpath API ready at http://localhost:${PORT}/api`);
});

export default app;
