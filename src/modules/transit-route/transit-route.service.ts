/**
 * =============================================================================
 * TRANSIT ROUTE MODULE - SERVICE
 * =============================================================================
 *
 * Routes served from the terminal. The slug identifies a route on the public
 * queue and TV display endpoints.
 * =============================================================================
 */

import { NotFoundError } from '../../core/errors/AppError';
import { db } from '../../shared/database/db';
import { RouteRecord } from '../../shared/database/records';
import { Repositories } from '../../shared/database/repository.interface';
import { logger } from '../../shared/services/logger.service';
import { CreateRouteInput, UpdateRouteInput } from './transit-route.schema';

export interface RouteView extends RouteRecord {
  slug: string;
}

/**
 * "Central - North Loop" → "central-north-loop"
 */
export function routeSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function toRouteView(route: RouteRecord): RouteView {
  return { ...route, slug: routeSlug(route.name) };
}

export class TransitRouteService {
  constructor(private readonly repos: Repositories = db) {}

  async listRoutes(activeOnly = false): Promise<RouteView[]> {
    const routes = await this.repos.fleet.listRoutes(activeOnly);
    return routes.map(toRouteView);
  }

  async getRoute(id: number): Promise<RouteView> {
    const route = await this.repos.fleet.findRouteById(id);
    if (!route) {
      throw new NotFoundError('Route not found');
    }
    return toRouteView(route);
  }

  /**
   * Route whose slug matches, or null
   */
  async findBySlug(slug: string): Promise<RouteView | null> {
    const routes = await this.listRoutes();
    return routes.find(route => route.slug === slug.toLowerCase()) ?? null;
  }

  async createRoute(input: CreateRouteInput): Promise<RouteView> {
    const route = await this.repos.fleet.createRoute(input);
    logger.info('Route created', { routeId: route.id, name: route.name });
    return toRouteView(route);
  }

  async updateRoute(id: number, input: UpdateRouteInput): Promise<RouteView> {
    const route = await this.repos.fleet.updateRoute(id, input);
    if (!route) {
      throw new NotFoundError('Route not found');
    }
    return toRouteView(route);
  }

  async deleteRoute(id: number): Promise<void> {
    const deleted = await this.repos.fleet.deleteRoute(id);
    if (!deleted) {
      throw new NotFoundError('Route not found');
    }
    logger.info('Route deleted', { routeId: id });
  }
}

export const transitRouteService = new TransitRouteService();
