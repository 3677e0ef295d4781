import { z } from 'zod';

/** Every thirdData endpoint answers with this envelope */
export const envelopeSchema = z.object({
  success: z.boolean(),
  failCode: z.number().nullish(),
  message: z.string().nullish(),
  data: z.unknown(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export const dataItemMapSchema = z.record(
  z.union([z.number(), z.string(), z.boolean(), z.null()])
);

export type DataItemMap = z.infer<typeof dataItemMapSchema>;

export const plantSchema = z.object({
  plantCode: z.string(),
  plantName: z.string(),
  plantAddress: z.string().nullish(),
  capacity: z.number().nullish(),
});

export type PlantRecord = z.infer<typeof plantSchema>;

export const plantPageSchema = z.object({
  list: z.array(plantSchema),
  pageCount: z.number(),
  pageNo: z.number(),
  total: z.number(),
});

export const deviceSchema = z.object({
  id: z.number(),
  devName: z.string(),
  stationCode: z.string(),
  devTypeId: z.number(),
  esnCode: z.string().nullish(),
  model: z.string().nullish(),
  softwareVersion: z.string().nullish(),
});

export type DeviceRecord = z.infer<typeof deviceSchema>;

export const plantRealtimeSchema = z.object({
  stationCode: z.string(),
  dataItemMap: dataItemMapSchema,
});

export type PlantRealtimeRecord = z.infer<typeof plantRealtimeSchema>;

export const deviceRealtimeSchema = z.object({
  devId: z.number(),
  sn: z.string().nullish(),
  dataItemMap: dataItemMapSchema,
});

export type DeviceRealtimeRecord = z.infer<typeof deviceRealtimeSchema>;
