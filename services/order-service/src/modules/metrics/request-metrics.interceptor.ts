import { CallHandler, ExecutionContext, HttpException, Injectable, NestInterceptor } from "@nestjs/common";
import { Observable, throwError } from "rxjs";
import { catchError, finalize } from "rxjs/operators";
import { DomainError } from "../../common/domain-errors";
import { MetricsService } from "./metrics.service";

type MetricsRequest = {
  method?: string;
  url?: string;
  routeOptions?: { url?: string };
};

type MetricsReply = {
  statusCode?: number;
};

@Injectable()
export class RequestMetricsInterceptor implements NestInterceptor {
  constructor(private readonly metrics: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== "http") return next.handle();
    const req = context.switchToHttp().getRequest<MetricsRequest>();
    const res = context.switchToHttp().getResponse<MetricsReply>();
    const start = Date.now();
    // The reply status is not set yet when a handler throws.
    let failedStatus: number | null = null;
    let errorCode: string | undefined;

    return next.handle().pipe(
      catchError((error: unknown) => {
        failedStatus = error instanceof HttpException ? error.getStatus() : 500;
        if (error instanceof DomainError) errorCode = error.code;
        return throwError(() => error);
      }),
      finalize(() => {
        // Templated route (e.g. /orders/:orderId) keeps per-order URLs out of the key set.
        const route = String(req.routeOptions?.url || req.url || "/").split("?")[0];
        this.metrics.record({
          method: String(req.method || "UNKNOWN").toUpperCase(),
          route,
          status: failedStatus ?? Number(res.statusCode || 200),
          durationMs: Date.now() - start,
          atUnixMs: Date.now(),
          errorCode,
        });
      }),
    );
  }
}
