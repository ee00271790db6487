import type { StructLayout } from "../../src/layout/index.ts";
import { buildRegistry } from "../../src/registry/index.ts";

export const SENSOR_HEADER = `
typedef struct {
    float temperature;
    uint16_t humidity;
    int32_t pressure;
} SensorData;

typedef struct {
    uint32_t timestamp;
    SensorData primary_sensor;
    SensorData secondary_sensor;
    uint8_t error_flags;
    float battery_voltage;
} DeviceStatus;

typedef struct {
    uint8_t station_id;
    SensorData readings[3];
} Station;
`;

export function layoutFrom(text: string, name: string): StructLayout {
  return buildRegistry([text]).layoutOf(name);
}

/** Lowercase hex pairs separated by spaces. */
export function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(" ");
}

/** Runs `fn` and returns what it threw. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error to be thrown");
}
