/**
 * CORS Middleware Configuration
 * Handles cross-origin resource sharing for the API
 */
import cors from "cors";

/**
 * Get allowed origins from environment variables
 */
export const getAllowedOrigins = (): string[] => {
  const origins: string[] = [
    'http://localhost:3000',
    'http://localhost:3001',
    'http://localhost:5173',
  ];

  // Add production frontend URL from environment variable
  if (process.env.FRONTEND_URL) {
    origins.push(process.env.FRONTEND_URL);
  }

  return origins;
};

export function isOriginAllowed(origin: string | undefined): boolean {
  // Requests with no origin (curl, server-to-server) are allowed
  if (!origin) {
    return true;
  }
  if (getAllowedOrigins().includes(origin)) {
    return true;
  }
  return /^https?:\/\/localhost(:\d+)?$/.test(origin);
}

/**
 * CORS configuration
 */
export const corsConfig = cors({
  origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    if (isOriginAllowed(origin)) {
      return callback(null, true);
    }

    console.warn('CORS blocked origin:', origin);
    callback(new Error('Not allowed by CORS'));
  },
  credentials: true,
  methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
  exposedHeaders: ['Content-Length'],
  optionsSuccessStatus: 200,
  preflightContinue: false,
});
