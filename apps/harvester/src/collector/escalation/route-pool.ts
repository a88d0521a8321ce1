/**
 * Alternate egress routes, handed out once each in configured order.
 */

import type { RouteConfig } from '../types.js'

export class RoutePool {
  private readonly routes: RouteConfig[]
  private cursor = 0

  constructor(routes: readonly RouteConfig[]) {
    const ids = new Set<string>()
    this.routes = []
    for (const route of routes) {
      if (ids.has(route.id)) continue
      ids.add(route.id)
      this.routes.push(route)
    }
  }

  static fromIds(ids: readonly string[]): RoutePool {
    return new RoutePool(ids.map((id) => ({ id })))
  }

  get size(): number {
    return this.routes.length
  }

  get remaining(): number {
    return this.routes.length - this.cursor
  }

  isExhausted(): boolean {
    return this.cursor >= this.routes.length
  }

  /** Next unused route, or null once every route has been handed out */
  next(): RouteConfig | null {
    if (this.isExhausted()) return null
    const route = this.routes[this.cursor]
    this.cursor += 1
    return route
  }
}
