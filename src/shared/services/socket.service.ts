/**
 * =============================================================================
 * SOCKET SERVICE - Real-time Queue and Deposit Updates
 * =============================================================================
 *
 * Pushes terminal changes to connected screens:
 * - queue_updated to everyone (staff consoles and the public TV display)
 * - deposit_updated to managers and the treasurer who filed the request
 * - settings_updated to everyone
 *
 * Rooms:
 * - `public`       every socket, with or without a token
 * - `role:<role>`  authenticated sockets, by role
 * - `user:<id>`    authenticated sockets, by user
 *
 * Emits are no-ops until initializeSocket() runs (tests, scripts).
 * =============================================================================
 */

import { Server as HttpServer } from 'http';
import { Server, Socket } from 'socket.io';
import { config } from '../../config/environment';
import { MANAGER_ROLES, SOCKET_EVENTS, UserRole } from '../../core/constants';
import { AuthUser, verifyAccessToken } from '../middleware/auth.middleware';
import { logger } from './logger.service';

const PUBLIC_ROOM = 'public';

export interface QueueUpdate {
  action: 'entered' | 'exited' | 'boarding' | 'departed' | 'rescheduled';
  entryId: number;
  vehicleId: number;
  routeId: number | null;
  queueLength: number;
}

export interface DepositUpdate {
  depositId: number;
  referenceNumber: string;
  status: string;
  walletId: number;
  balance: number | null;
  createdById: number | null;
}

interface ServerToClientEvents {
  connected: (payload: { message: string; authenticated: boolean }) => void;
  queue_updated: (update: QueueUpdate) => void;
  deposit_updated: (update: DepositUpdate) => void;
  settings_updated: (settings: object) => void;
}

// Clients only listen
interface ClientToServerEvents {}

interface InterServerEvents {}

interface SocketData {
  user: AuthUser | null;
}

type TerminalServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
type TerminalSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

let io: TerminalServer | null = null;

const roleRoom = (role: UserRole) => `role:${role}`;
const userRoom = (userId: number) => `user:${userId}`;

/**
 * Attach Socket.IO to the HTTP server
 */
export function initializeSocket(server: HttpServer): TerminalServer {
  const socketServer: TerminalServer = new Server(server, {
    cors: {
      origin: config.cors.origin,
      methods: ['GET', 'POST'],
      credentials: true
    },
    pingTimeout: 20000,
    pingInterval: 25000,
    transports: ['websocket', 'polling']
  });

  // A token is optional: TV displays connect anonymously
  socketServer.use((socket, next) => {
    const token: unknown = socket.handshake.auth.token;
    if (typeof token !== 'string' || token === '') {
      socket.data.user = null;
      next();
      return;
    }

    try {
      socket.data.user = verifyAccessToken(token);
      next();
    } catch (error) {
      logger.warn('Socket authentication failed', {
        socketId: socket.id,
        error: error instanceof Error ? error.message : String(error)
      });
      next(new Error('Invalid token'));
    }
  });

  socketServer.on('connection', (socket: TerminalSocket) => {
    const user = socket.data.user ?? null;
    void socket.join(PUBLIC_ROOM);
    if (user) {
      void socket.join(roleRoom(user.role));
      void socket.join(userRoom(user.userId));
    }

    logger.debug('Socket connected', {
      socketId: socket.id,
      userId: user?.userId ?? 'anonymous',
      role: user?.role ?? 'public'
    });

    socket.emit(SOCKET_EVENTS.CONNECTED, {
      message: 'Connected successfully',
      authenticated: user !== null
    });

    socket.on('disconnect', (reason) => {
      logger.debug('Socket disconnected', { socketId: socket.id, reason });
    });
  });

  io = socketServer;
  logger.info('Socket.IO initialized');
  return socketServer;
}

export function getConnectionCount(): number {
  return io?.engine.clientsCount ?? 0;
}

export async function closeSocket(): Promise<void> {
  if (!io) return;
  const server = io;
  io = null;
  await new Promise<void>((resolve) => {
    void server.close(() => resolve());
  });
}

// =============================================================================
// DOMAIN EVENTS
// =============================================================================

export const socketService = {
  queueUpdated(update: QueueUpdate): void {
    io?.to(PUBLIC_ROOM).emit(SOCKET_EVENTS.QUEUE_UPDATED, update);
  },

  /**
   * Managers see every decision; the treasurer sees their own requests
   */
  depositUpdated(update: DepositUpdate): void {
    if (!io) return;
    io.to(MANAGER_ROLES.map(roleRoom)).emit(SOCKET_EVENTS.DEPOSIT_UPDATED, update);
    if (update.createdById !== null) {
      io.to(userRoom(update.createdById)).emit(SOCKET_EVENTS.DEPOSIT_UPDATED, update);
    }
  },

  settingsUpdated(settings: object): void {
    io?.to(PUBLIC_ROOM).emit(SOCKET_EVENTS.SETTINGS_UPDATED, settings);
  }
};
