import { BaseService } from "./base.service";
import { WithErrorHandling } from "./mixins/error-handling.mixin";
import { WithLifecycle } from "./mixins/lifecycle.mixin";
import { WithMonitoring } from "./mixins/monitoring.mixin";

/**
 * Lifecycle hooks, owned timers, counters and per-context error tracking on top of BaseService
 */
export abstract class StandardService extends WithErrorHandling(WithMonitoring(WithLifecycle(BaseService))) {}
