import { deviceSpec, type Catalog, type DeviceKind, type EdgeTarget } from "./catalog.js";

export type PinBinding = {
  pin: string;
  net: string;
  edge: string;
};

export type DeviceNode = {
  id: string;
  kind: DeviceKind;
  bindings: PinBinding[];
};

export type Incidence = {
  device: string;
  pin: string;
};

export type NetNode = {
  id: string;
  external: boolean;
  incidences: Incidence[];
};

export type ParsedGraph = {
  category?: string;
  tokenCount: number;
  devices: ReadonlyMap<string, DeviceNode>;
  nets: ReadonlyMap<string, NetNode>;
};

export type ParseError = {
  reason: string;
  position?: number;
  token?: string;
  category?: string;
  tokenCount: number;
};

/** Mutable graph under construction; only the parsers touch it. */
export type GraphDraft = {
  devices: Map<string, DeviceNode>;
  nets: Map<string, NetNode>;
  bindingCount: number;
};

export function newGraph(): GraphDraft {
  return { devices: new Map(), nets: new Map(), bindingCount: 0 };
}

export function addDevice(draft: GraphDraft, id: string, kind: DeviceKind): DeviceNode {
  const existing = draft.devices.get(id);
  if (existing) return existing;
  const node: DeviceNode = { id, kind, bindings: [] };
  draft.devices.set(id, node);
  return node;
}

function addNet(draft: GraphDraft, id: string, external: boolean): NetNode {
  const existing = draft.nets.get(id);
  if (existing) return existing;
  const node: NetNode = { id, external, incidences: [] };
  draft.nets.set(id, node);
  return node;
}

// An unordered terminal lands on the pin already tied to this net, else the
// first unbound pin, else the last pin (which then shows up as a conflict).
function terminalPin(catalog: Catalog, device: DeviceNode, net: string): string {
  const pins = deviceSpec(catalog, device.kind).pins;
  const same = device.bindings.find((b) => b.net === net && pins.includes(b.pin));
  if (same) return same.pin;
  const free = pins.find((p) => !device.bindings.some((b) => b.pin === p));
  return free ?? pins[pins.length - 1];
}

export function bindEdge(
  draft: GraphDraft,
  catalog: Catalog,
  device: DeviceNode,
  edge: { text: string; target: EdgeTarget },
  net: { text: string; external: boolean },
): void {
  const pins = edge.target.kind === "pins" ? edge.target.pins : [terminalPin(catalog, device, net.text)];
  const netNode = addNet(draft, net.text, net.external);
  for (const pin of pins) {
    device.bindings.push({ pin, net: net.text, edge: edge.text });
    if (!netNode.incidences.some((i) => i.device === device.id && i.pin === pin)) {
      netNode.incidences.push({ device: device.id, pin });
    }
  }
  draft.bindingCount += 1;
}

export function finishGraph(draft: GraphDraft, tokenCount: number, category?: string): ParsedGraph {
  return {
    category,
    tokenCount,
    devices: draft.devices,
    nets: draft.nets,
  };
}
