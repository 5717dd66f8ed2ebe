import { z } from 'zod';
import { InvalidParameterError } from '@evsim/domain';

const thermalSchema = z.object({
  ambientC: z.number().finite().default(25),
  lossCoefficientWPerC: z.number().finite().nonnegative().default(2.5),
  thermalMassJPerC: z.number().finite().positive().default(120),
  derateThresholdC: z.number().finite().default(80),
  criticalThresholdC: z.number().finite().default(100),
  /** null turns rapid-rise detection off */
  rateWarnCPerS: z.number().finite().positive().nullable().default(0.08),
});

const injectorSchema = z.object({
  maxDelayMs: z.number().int().nonnegative().default(5_000),
  maxJitterMs: z.number().int().nonnegative().default(1_000),
  floodBurstSize: z.number().int().positive().default(20),
  dosMode: z.enum(['flood', 'drop']).default('flood'),
  replayHistorySize: z.number().int().positive().default(16),
  spoofIdentity: z.string().min(1).default('CP-ROGUE-666'),
});

const identitySchema = z.object({
  chargePointId: z.string().min(1).default('CP-SIM-001'),
  vehicleId: z.string().min(1).default('EV-TEST-001'),
  idTag: z.string().min(1).default('TAG-0001'),
});

export const sessionConfigSchema = z
  .object({
    tickIntervalMs: z.number().int().positive().default(1_000),
    nominalCurrentAmp: z.number().finite().positive().default(32),
    nominalVoltageV: z.number().finite().positive().default(230),
    contactResistanceOhm: z.number().finite().nonnegative().default(0.00005),
    faultResistanceOhm: z.number().finite().nonnegative().default(0.0035),
    derateStepsAmp: z.array(z.number().finite().nonnegative()).default([16, 10, 0]),
    adapterFailureThreshold: z.number().int().positive().default(3),
    busReceiveTimeoutMs: z.number().int().nonnegative().default(10),
    initialSocPct: z.number().min(0).max(100).default(20),
    batteryCapacityWh: z.number().finite().positive().default(60_000),
    energyErrorThreshold: z.number().min(0).lt(1).default(0.15),
    seed: z.number().int().default(42),
    thermal: thermalSchema.default({}),
    injector: injectorSchema.default({}),
    identity: identitySchema.default({}),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.thermal.derateThresholdC >= cfg.thermal.criticalThresholdC) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['thermal', 'derateThresholdC'],
        message: 'must be below criticalThresholdC',
      });
    }
    // forward Euler on the contact temperature needs dt * k / C < 1
    const { lossCoefficientWPerC: k, thermalMassJPerC: c } = cfg.thermal;
    const dtSeconds = cfg.tickIntervalMs / 1_000;
    if ((dtSeconds * k) / c >= 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tickIntervalMs'],
        message: `must be below ${(c / k) * 1_000} ms for k=${k} W/°C and C=${c} J/°C`,
      });
    }
    let ceiling = cfg.nominalCurrentAmp;
    cfg.derateStepsAmp.forEach((step, i) => {
      if (step > ceiling) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['derateStepsAmp', i],
          message: `must not exceed the previous step (${ceiling} A)`,
        });
      }
      ceiling = step;
    });
  });

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type InjectorLimits = SessionConfig['injector'];

export function parseSessionConfig(input: unknown = {}): SessionConfig {
  const parsed = sessionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidParameterError(
      'Invalid session configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/** Layers `override` on `base`, one level deep for the nested groups. */
export function mergeSessionConfig(base: SessionConfigInput, override: SessionConfigInput = {}): SessionConfigInput {
  return {
    ...base,
    ...override,
    thermal: { ...base.thermal, ...override.thermal },
    injector: { ...base.injector, ...override.injector },
    identity: { ...base.identity, ...override.identity },
  };
}
