import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warning', 'error']);

export const systemConfigSchema = z.object({
  logLevel: logLevelSchema,
});

export const fusionSolarConfigSchema = z.object({
  username: z.string().min(1),
  /** The "system code" issued with the northbound API account */
  password: z.string().min(1),
  baseUrl: z.string().url().optional(),
});

export const mqttConfigSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    protocol: z.enum(['mqtt', 'mqtts', 'ws', 'wss']).default('mqtt'),
    auth: z.boolean(),
    username: z.string().nullish(),
    password: z.string().nullish(),
    topic: z.string().min(1),
    /** ms, for the connection and for the publish acknowledgement */
    connectTimeout: z.number().int().positive(),
    clientId: z.string().min(1).default('fusionsolar-mqtt'),
    qos: z.union([z.literal(0), z.literal(1), z.literal(2)]).default(0),
    retain: z.boolean().default(false),
  })
  .superRefine((config, ctx) => {
    if (!config.auth) return;
    for (const key of ['username', 'password'] as const) {
      if (!config[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'Required when auth is enabled',
        });
      }
    }
  });

export const appConfigSchema = z.object({
  system: systemConfigSchema,
  fusionsolar: fusionSolarConfigSchema,
  mqtt: mqttConfigSchema,
});

export type SystemConfig = z.infer<typeof systemConfigSchema>;
export type FusionSolarConfig = z.infer<typeof fusionSolarConfigSchema>;
export type MqttConfig = z.infer<typeof mqttConfigSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
