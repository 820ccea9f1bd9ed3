/**
 * Zod schemas for parameter descriptions published by a geoprocessing task
 */

import { z } from 'zod';

export const ParameterDirectionSchema = z.enum([
  'esriGPParameterDirectionInput',
  'esriGPParameterDirectionOutput',
]);

export const ParameterTypeSchema = z.enum([
  'esriGPParameterTypeRequired',
  'esriGPParameterTypeOptional',
  'esriGPParameterTypeDerived',
]);

export const ParameterInfoJsonSchema = z.object({
  name: z.string().min(1, 'Parameter name must not be empty'),
  dataType: z.string().min(1, 'Parameter dataType must not be empty'),
  displayName: z.string().optional(),
  description: z.string().optional(),
  direction: ParameterDirectionSchema.optional(),
  parameterType: ParameterTypeSchema.optional(),
  category: z.string().optional(),
  defaultValue: z.unknown().optional(),
  choiceList: z.array(z.string()).optional(),
});

export type ParameterDirection = z.infer<typeof ParameterDirectionSchema>;
export type ParameterType = z.infer<typeof ParameterTypeSchema>;
export type ParameterInfoJson = z.infer<typeof ParameterInfoJsonSchema>;
