/**
 * Express HTTP Server
 * Every request passes the validation middleware before routing.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { createServer, type Server as HttpServer } from 'http';
import { createValidationMiddleware } from './middleware.js';
import { DEFAULT_SERVER_CONFIG, type RequestValidator, type ServerConfig } from '../types/index.js';

export const SUBMIT_ACKNOWLEDGMENT = { message: 'Data submitted successfully!' } as const;

interface HttpError extends Error {
  status?: number;
}

function clientErrorStatus(err: HttpError): number | null {
  const status = err.status;
  if (typeof status === 'number' && status >= 400 && status < 500) return status;
  return null;
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private validator: RequestValidator;

  constructor(validator: RequestValidator, config: Partial<ServerConfig> = {}) {
    this.config = {
      ...DEFAULT_SERVER_CONFIG,
      ...config,
    };

    const status = this.config.rejectionStatus;
    if (!Number.isInteger(status) || status < 400 || status > 599) {
      throw new Error(`Invalid rejection status: ${status} (expected 400-599)`);
    }

    this.validator = validator;
    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    // Every content type arrives as a Buffer; the body is never parsed as JSON
    this.app.use(express.raw({ type: () => true, limit: this.config.bodyLimit }));
    this.app.use(createValidationMiddleware(this.validator, {
      rejectionStatus: this.config.rejectionStatus,
    }));
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Submit data
    this.app.post('/submit', (_req: Request, res: Response) => {
      res.status(200).json(SUBMIT_ACKNOWLEDGMENT);
    });

    // Error handler
    this.app.use((err: HttpError, _req: Request, res: Response, _next: NextFunction) => {
      const status = clientErrorStatus(err);
      if (status !== null) {
        res.status(status).json({ error: err.message });
        return;
      }

      console.error('API Error:', err);
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`Request Wall listening at http://${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getApp(): Express {
    return this.app;
  }

  /** Bound port once listening, configured port before */
  getPort(): number {
    const address = this.server.address();
    if (address !== null && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}
