import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { InputValidationError } from '../../common/errors/query-cache.errors';

/**
 * JSON codec for one record class.
 *
 * decode(encode(v)) yields a value equal to v. Anything that does not
 * pass the class-validator rules of the record class is refused.
 */
export class RecordCodec<T extends object> {
  constructor(
    private readonly recordClass: ClassConstructor<T>,
    readonly recordName: string,
  ) {}

  encode(value: T): string {
    return JSON.stringify(value);
  }

  decode(raw: string): T {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new InputValidationError(
        `${this.recordName} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return this.fromPlain(parsed);
  }

  fromPlain(plain: unknown): T {
    if (plain === null || typeof plain !== 'object' || Array.isArray(plain)) {
      throw new InputValidationError(`${this.recordName} must be a JSON object`);
    }

    const record = plainToInstance(this.recordClass, plain);
    const errors = validateSync(record, { forbidUnknownValues: true });
    if (errors.length > 0) {
      throw new InputValidationError(
        `${this.recordName} failed validation: ${formatErrors(errors).join('; ')}`,
      );
    }

    return record;
  }
}

function formatErrors(errors: ValidationError[], parent = ''): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    const path = parent ? `${parent}.${error.property}` : error.property;
    if (error.constraints) {
      messages.push(`${path}: ${Object.values(error.constraints).join(', ')}`);
    }
    if (error.children && error.children.length > 0) {
      messages.push(...formatErrors(error.children, path));
    }
  }
  return messages;
}
