import { CallHandler, Injectable, NestInterceptor } from "@nestjs/common";
import type { ApiSuccess } from "@gst-billing/shared";
import { Observable } from "rxjs";
import { map } from "rxjs/operators";
import { RequestContext } from "../logging/request-context";

@Injectable()
export class ResponseInterceptor implements NestInterceptor {
  intercept(_context: unknown, next: CallHandler): Observable<ApiSuccess<unknown>> {
    return next.handle().pipe(
      map((data) => ({
        ok: true as const,
        data,
        requestId: RequestContext.get()?.requestId,
      })),
    );
  }
}
