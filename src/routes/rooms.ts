import { Hono } from 'hono';
import type { RoomManager } from '../services/roomManager.js';

export default function roomRoutes(manager: RoomManager): Hono {
  const rooms = new Hono();

  // GET /status: every occupied room
  rooms.get('/status', (c) => {
    return c.json(manager.getStatus());
  });

  // GET /rooms/active: rooms observers can watch right now
  rooms.get('/rooms/active', (c) => {
    return c.json({ rooms: manager.activeRoomSummaries() });
  });

  return rooms;
}
