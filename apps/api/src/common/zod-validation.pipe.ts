import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { ZodSchema } from "zod";
import { ErrorCodes } from "@gst-billing/shared";

@Injectable()
export class ZodValidationPipe implements PipeTransform {
  constructor(private readonly schema: ZodSchema) {}

  transform(value: unknown) {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      const flattened = result.error.flatten();
      throw new BadRequestException({
        code: ErrorCodes.VALIDATION_ERROR,
        message: "Validation failed",
        details: { ...flattened.fieldErrors, ...(flattened.formErrors.length ? { _form: flattened.formErrors } : {}) },
      });
    }
    return result.data;
  }
}
