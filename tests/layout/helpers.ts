import type { FieldLayout, StructLayout } from "../../src/layout/index.ts";
import { LayoutCalculator } from "../../src/layout/index.ts";
import { parseHeader } from "../../src/parser/index.ts";
import { resolveOrder } from "../../src/resolver/index.ts";
import { TypeScope } from "../../src/resolver/scope.ts";

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
`;

export function calculatorFor(text: string): { scope: TypeScope; calculator: LayoutCalculator } {
  const scope = TypeScope.fromHeaders([parseHeader(text, "test.h")]);
  return { scope, calculator: new LayoutCalculator(scope) };
}

/** Lays out every struct in `text` and returns the one named `name`. */
export function layoutOf(text: string, name: string): StructLayout {
  const { scope, calculator } = calculatorFor(text);
  calculator.layoutAll(resolveOrder(scope));
  const decl = scope.lookupStruct(name);
  if (decl === undefined) throw new Error(`no struct '${name}' in test source`);
  return calculator.layoutOf(decl);
}

export function fieldOf(layout: StructLayout, name: string): FieldLayout {
  const field = layout.fields.find((f) => f.name === name);
  if (field === undefined) throw new Error(`no field '${name}' in '${layout.name}'`);
  return field;
}

/** `name@offset+size` for each field. */
export function placement(layout: StructLayout): string[] {
  return layout.fields.map((f) => `${f.name}@${f.offset}+${f.size}`);
}
