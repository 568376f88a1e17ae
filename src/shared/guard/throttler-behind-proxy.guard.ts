import { Injectable } from '@nestjs/common'
import { ThrottlerGuard } from '@nestjs/throttler'

/**
 * Rate-limit by the originating client IP when running behind a reverse proxy
 */
@Injectable()
export class ThrottlerBehindProxyGuard extends ThrottlerGuard {
  protected async getTracker(req: Record<string, unknown>): Promise<string> {
    const ips = req.ips
    if (Array.isArray(ips) && typeof ips[0] === 'string') return ips[0]
    return typeof req.ip === 'string' ? req.ip : 'unknown'
  }
}
