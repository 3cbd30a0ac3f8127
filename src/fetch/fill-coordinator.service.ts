import { Injectable } from "@nestjs/common";
import type { FillOutcome } from "@/common/types/fetch";
import { FetchCoordinator } from "./fetch-coordinator";

/**
 * The process-wide coordinator for cache fills
 */
@Injectable()
export class FillCoordinatorService extends FetchCoordinator<FillOutcome> {}
