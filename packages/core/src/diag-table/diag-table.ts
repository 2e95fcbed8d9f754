/**
 * DiagTable
 * =========
 * Declares which model fields are written, how often, and into which output files.
 *
 * Re-registering a file name with `addFile` replaces its frequency and units
 * and keeps the fields already attached to it. Pass `{ resetFields: true }`
 * to start the record over with an empty field list.
 *
 * `addField` without an explicit file list attaches the field to the files
 * that exist at call time only; files added later do not receive it.
 */

import { z } from 'zod';
import { NotFoundError, ValidationError } from '@gcmrun/utils';

export const TIME_UNITS = ['seconds', 'minutes', 'hours', 'days', 'months', 'years'] as const;

export type TimeUnit = (typeof TIME_UNITS)[number];

export interface DiagField {
  module: string;
  name: string;
  timeAverage: boolean;
}

export interface DiagOutputFile {
  name: string;
  frequency: number;
  unit: TimeUnit;
  timeUnit: TimeUnit;
  fields: DiagField[];
}

export interface AddFileOptions {
  /** Drop fields already attached to a re-registered file */
  resetFields?: boolean;
}

export interface AddFieldOptions {
  timeAverage?: boolean;
  /** Files to attach to; defaults to every file defined right now */
  files?: readonly string[];
}

const TimeUnitSchema = z.enum(TIME_UNITS);

/**
 * Serializable form used by experiment configuration files
 */
export const DiagTableSpecSchema = z.object({
  files: z
    .array(
      z.object({
        name: z.string().min(1),
        frequency: z.number().int(),
        unit: TimeUnitSchema.default('hours'),
        timeUnit: TimeUnitSchema.optional(),
      })
    )
    .default([]),
  fields: z
    .array(
      z.object({
        module: z.string().min(1),
        name: z.string().min(1),
        timeAverage: z.boolean().default(false),
        files: z.array(z.string().min(1)).optional(),
      })
    )
    .default([]),
});

export type DiagTableSpec = z.input<typeof DiagTableSpecSchema>;

function checkUnit(unit: string, file: string): TimeUnit {
  const parsed = TimeUnitSchema.safeParse(unit);
  if (!parsed.success) {
    throw new ValidationError(`Unknown time unit '${unit}' for output file '${file}'`, {
      file,
      unit,
      allowed: TIME_UNITS,
    });
  }
  return parsed.data;
}

function copyFile(file: DiagOutputFile): DiagOutputFile {
  return { ...file, fields: file.fields.map((field) => ({ ...field })) };
}

export class DiagTable {
  private readonly files = new Map<string, DiagOutputFile>();

  static fromSpec(spec: DiagTableSpec): DiagTable {
    const parsed = DiagTableSpecSchema.safeParse(spec);
    if (!parsed.success) {
      const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new ValidationError(`Invalid diag table: ${msg}`, { issues: parsed.error.issues });
    }

    const table = new DiagTable();
    for (const file of parsed.data.files) {
      table.addFile(file.name, file.frequency, file.unit, file.timeUnit);
    }
    for (const field of parsed.data.fields) {
      table.addField(field.module, field.name, { timeAverage: field.timeAverage, files: field.files });
    }
    return table;
  }

  addFile(
    name: string,
    frequency: number,
    unit: string = 'hours',
    timeUnit?: string,
    options: AddFileOptions = {}
  ): this {
    if (name.trim() === '') {
      throw new ValidationError('Output file name must not be empty');
    }
    if (!Number.isInteger(frequency)) {
      throw new ValidationError(`Output frequency for '${name}' must be an integer`, { name, frequency });
    }
    const checkedUnit = checkUnit(unit, name);
    const checkedTimeUnit = timeUnit === undefined ? checkedUnit : checkUnit(timeUnit, name);

    const existing = this.files.get(name);
    this.files.set(name, {
      name,
      frequency,
      unit: checkedUnit,
      timeUnit: checkedTimeUnit,
      fields: existing && !options.resetFields ? existing.fields : [],
    });
    return this;
  }

  addField(module: string, name: string, options: AddFieldOptions = {}): this {
    const targets = options.files ? [...options.files] : [...this.files.keys()];
    const unknown = targets.filter((file) => !this.files.has(file));
    if (unknown.length > 0) {
      throw new ValidationError(`Field ${module}.${name} names undefined output files: ${unknown.join(', ')}`, {
        module,
        name,
        unknown,
      });
    }

    for (const target of targets) {
      this.files.get(target)?.fields.push({ module, name, timeAverage: options.timeAverage ?? false });
    }
    return this;
  }

  /**
   * Deep, independent clone
   */
  copy(): DiagTable {
    const clone = new DiagTable();
    for (const [name, file] of this.files) {
      clone.files.set(name, copyFile(file));
    }
    return clone;
  }

  get size(): number {
    return this.files.size;
  }

  get fileNames(): string[] {
    return [...this.files.keys()];
  }

  getFile(name: string): DiagOutputFile {
    const file = this.files.get(name);
    if (!file) {
      throw new NotFoundError('Diag table output file', name);
    }
    return copyFile(file);
  }

  /**
   * Output files in registration order (copies)
   */
  outputFiles(): DiagOutputFile[] {
    return [...this.files.values()].map(copyFile);
  }

  toSpec(): z.output<typeof DiagTableSpecSchema> {
    const files = this.outputFiles();
    return {
      files: files.map(({ name, frequency, unit, timeUnit }) => ({ name, frequency, unit, timeUnit })),
      fields: files.flatMap((file) =>
        file.fields.map((field) => ({ ...field, files: [file.name] }))
      ),
    };
  }
}
