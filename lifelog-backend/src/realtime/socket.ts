import { Server as SocketServer } from 'socket.io';
import type { Server as HttpServer } from 'node:http';
import { verifyOperatorToken } from '../auth/jwt.js';
import { config } from '../config.js';

/**
 * Set up Socket.IO with the /events namespace.
 * Clients authenticate with a JWT in handshake.auth.token.
 *
 * Events emitted on /events:
 *   capture      every persisted capture event (analyzed or skipped)
 *   cost:alert   the daily notification threshold was reached
 */
export function setupSocketIO(server: HttpServer) {
  const io = new SocketServer(server, {
    cors: {
      origin: config.corsOrigins,
      methods: ['GET', 'POST'],
    },
    pingInterval: 25000,
    pingTimeout: 10000,
  });

  const eventsNs = io.of('/events');

  eventsNs.use((socket, next) => {
    const token: unknown = socket.handshake.auth.token;
    if (!token || typeof token !== 'string') {
      next(new Error('Authentication required'));
      return;
    }

    const payload = verifyOperatorToken(token);
    if (!payload) {
      next(new Error('Invalid or expired token'));
      return;
    }

    next();
  });

  eventsNs.on('connection', (socket) => {
    console.log(`[Socket.IO] /events client connected: ${socket.id}`);
    socket.on('disconnect', (reason) => {
      console.log(`[Socket.IO] /events client disconnected: ${socket.id} (${reason})`);
    });
  });

  console.log('[Socket.IO] WebSocket server initialized with /events namespace');

  return { io, eventsNs };
}
