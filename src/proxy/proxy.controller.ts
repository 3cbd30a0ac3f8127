import { All, Controller, Req, Res } from "@nestjs/common";
import type { Request, Response } from "express";
import { BaseController } from "@/common/base";
import { ProxyService } from "./proxy.service";

/**
 * Single catch-all route: every method and path goes through the proxy
 */
@Controller()
export class ProxyController extends BaseController {
  constructor(private readonly proxyService: ProxyService) {
    super();
  }

  @All("*")
  async proxy(@Req() req: Request, @Res() res: Response): Promise<void> {
    await this.executeOperation(() => this.proxyService.handle(req, res), `${req.method} ${req.originalUrl}`, {
      requestId: this.requestIdOf(req),
      // large artifact transfers routinely take minutes
      performanceThreshold: 60_000,
    });
  }
}
