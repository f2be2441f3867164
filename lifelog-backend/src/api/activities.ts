/**
 * REST API for capture events.
 *
 * Endpoints:
 *   GET   /api/activities?camera=&room=&category=&person=&from=&to=&search=&limit=&offset=
 *   GET   /api/activities/:id
 *   PATCH /api/activities/:id/person   { personLabel: string | null }
 */

import { Router } from 'express';
import { z } from 'zod';
import { ACTIVITY_CATEGORIES } from '../db/schema.js';
import type { AppServices } from '../services.js';
import { idParamSchema, timeBoundSchema, validationError } from './validation.js';

const listQuerySchema = z.object({
  camera: z.string().min(1).optional(),
  room: z.string().min(1).optional(),
  category: z.enum(ACTIVITY_CATEGORIES).optional(),
  person: z.string().min(1).optional(),
  from: timeBoundSchema.optional(),
  to: timeBoundSchema.optional(),
  search: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

const tagBodySchema = z.object({
  personLabel: z.string().trim().min(1).max(100).nullable(),
});

export function createActivitiesRouter(services: AppServices): Router {
  const router = Router();
  const { activities, maintenance } = services;

  router.get('/', (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json(validationError(parsed.error));
      return;
    }

    const q = parsed.data;
    const result = activities.list({
      cameraId: q.camera,
      room: q.room,
      category: q.category,
      personLabel: q.person,
      from: q.from,
      to: q.to,
      search: q.search,
      limit: q.limit,
      offset: q.offset,
    });

    res.json({ ...result, limit: q.limit, offset: q.offset });
  });

  router.get('/:id', (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    if (!id.success) {
      res.status(400).json(validationError(id.error));
      return;
    }

    const activity = activities.getById(id.data);
    if (!activity) {
      res.status(404).json({ error: `Activity ${id.data} not found` });
      return;
    }
    res.json({ activity });
  });

  // Tagging changes which events pair up, so durations are recomputed from scratch
  router.patch('/:id/person', (req, res) => {
    const id = idParamSchema.safeParse(req.params.id);
    const body = tagBodySchema.safeParse(req.body);
    if (!id.success) {
      res.status(400).json(validationError(id.error));
      return;
    }
    if (!body.success) {
      res.status(400).json(validationError(body.error));
      return;
    }

    const updated = activities.tagPerson(id.data, body.data.personLabel);
    if (!updated) {
      res.status(404).json({ error: `Activity ${id.data} not found` });
      return;
    }

    const { durations, streak } = maintenance.refresh('recompute');
    console.log(`[Timeline] Activity ${id.data} tagged as ${body.data.personLabel ?? '(none)'}; ${durations.updated} durations changed`);

    res.json({ activity: activities.getById(id.data) ?? updated, durations, streak });
  });

  return router;
}
