import { describe, expect, it } from "vitest";
import { parseSequenceText } from "../src/sequence_parse.js";
import { catalog, graphOf } from "./helpers.js";

function failure(text: string, grammar: "device_major" | "walk" = "device_major") {
  const res = parseSequenceText(text, catalog, grammar);
  if (res.ok) throw new Error(`expected '${text}' to fail`);
  return res.error;
}

describe("parseSequence (device_major)", () => {
  it("records the category and stops at TRUNCATE", () => {
    const g = graphOf("CIRCUIT_Opamp->NM1->M_G->NET1->M_D->VOUT->M_S->VSS->M_B->VSS->TRUNCATE->PM1->M_G->NET9->");
    expect(g.category).toBe("Opamp");
    expect(g.tokenCount).toBe(9);
    expect([...g.devices.keys()]).toEqual(["NM1"]);
    expect([...g.nets.keys()]).toEqual(["NET1", "VOUT", "VSS"]);
    expect(g.devices.get("NM1")?.bindings).toEqual([
      { pin: "G", net: "NET1", edge: "M_G" },
      { pin: "D", net: "VOUT", edge: "M_D" },
      { pin: "S", net: "VSS", edge: "M_S" },
      { pin: "B", net: "VSS", edge: "M_B" },
    ]);
    expect(g.nets.get("VSS")?.incidences).toEqual([
      { device: "NM1", pin: "S" },
      { device: "NM1", pin: "B" },
    ]);
  });

  it("fails with a zero token count when TRUNCATE comes first", () => {
    expect(failure("TRUNCATE->NM1->M_G->NET1")).toEqual({
      reason: "Sequence is empty",
      position: 0,
      token: undefined,
      category: undefined,
      tokenCount: 0,
    });
    expect(failure("CIRCUIT_LDO->TRUNCATE").category).toBe("LDO");
  });

  it("tolerates trailing and doubled separators", () => {
    const g = graphOf("NM1->M_G->NET1->->M_D-> VOUT ->");
    expect(g.devices.get("NM1")?.bindings.map((b) => b.pin)).toEqual(["G", "D"]);
    expect(g.tokenCount).toBe(5);
  });

  it("reports grammar violations with the failing token and position", () => {
    expect(failure("M_G->NET1")).toMatchObject({ reason: "Edge-type 'M_G' has no preceding device", position: 0, token: "M_G" });
    expect(failure("NM1->NET1")).toMatchObject({ reason: "Net 'NET1' is not preceded by an edge-type", position: 1 });
    expect(failure("NET1->NM1")).toMatchObject({ reason: "Net 'NET1' appears before any device", position: 0 });
    expect(failure("NM1->M_G")).toMatchObject({ reason: "Sequence ends after edge-type 'M_G' without a net", token: "M_G" });
    expect(failure("NM1->M_G->NM2").reason).toBe("Edge-type 'M_G' is followed by device 'NM2' instead of a net");
    expect(failure("NM1->M_G->M_D").reason).toBe("Edge-type 'M_G' is followed by edge-type 'M_D' instead of a net");
    expect(failure("R1->M_G->NET1").reason).toBe("Edge-type 'M_G' does not belong to R1 (RESISTOR)");
    expect(failure("NM1->M_G->BOGUS")).toMatchObject({ reason: "Unknown token 'BOGUS'", position: 2, tokenCount: 2 });
    expect(failure("NM1->CIRCUIT_Opamp").reason).toBe("Circuit-type token 'CIRCUIT_Opamp' is only allowed first");
  });

  it("reopens a repeated device", () => {
    const g = graphOf("NM1->M_G->NET1->R1->R_P1->NET1->NM1->M_D->VOUT");
    expect(g.devices.get("NM1")?.bindings.map((b) => `${b.pin}:${b.net}`)).toEqual(["G:NET1", "D:VOUT"]);
    expect([...g.devices.keys()]).toEqual(["NM1", "R1"]);
  });

  it("binds every pin of a combined edge", () => {
    const g = graphOf("NM1->M_DG->NET1->M_BS->VSS");
    expect(g.devices.get("NM1")?.bindings.map((b) => `${b.pin}:${b.net}`)).toEqual(["D:NET1", "G:NET1", "B:VSS", "S:VSS"]);
    expect(g.nets.get("NET1")?.incidences).toHaveLength(2);
  });

  it("places passive terminal aliases on free pins", () => {
    const g = graphOf("R1->R_C->NET1->R_C->NET2");
    expect(g.devices.get("R1")?.bindings.map((b) => `${b.pin}:${b.net}`)).toEqual(["P1:NET1", "P2:NET2"]);
    const same = graphOf("C1->C_C->NET1->C_C->NET1");
    expect(same.devices.get("C1")?.bindings.map((b) => `${b.pin}:${b.net}`)).toEqual(["P1:NET1", "P1:NET1"]);
    expect(same.nets.get("NET1")?.incidences).toEqual([{ device: "C1", pin: "P1" }]);
  });
});

describe("parseSequence (walk)", () => {
  it("joins the nodes on either side of each edge", () => {
    const g = graphOf("NM1->M_G->NET1->M_G->NM2", "walk");
    expect(g.tokenCount).toBe(5);
    expect(g.nets.get("NET1")?.incidences).toEqual([
      { device: "NM1", pin: "G" },
      { device: "NM2", pin: "G" },
    ]);
  });

  it("reports walk grammar violations", () => {
    expect(failure("M_G->NM1", "walk").reason).toBe("Sequence starts with edge-type 'M_G'");
    expect(failure("NM1->NET1", "walk").reason).toBe("Node 'NET1' follows node 'NM1' without an edge-type");
    expect(failure("NM1->M_G->M_D", "walk").reason).toBe("Edge-type 'M_G' is followed by edge-type 'M_D'");
    expect(failure("NM1->M_G->NM2", "walk").reason).toBe("Edge-type 'M_G' joins 'NM1' and 'NM2', not a device and a net");
    expect(failure("NET1->M_G->R1", "walk").reason).toBe("Edge-type 'M_G' does not belong to R1 (RESISTOR)");
    expect(failure("NM1->M_G", "walk").reason).toBe("Sequence ends after edge-type 'M_G'");
    expect(failure("NET1", "walk")).toMatchObject({ reason: "Sequence has no device tokens", tokenCount: 1 });
  });
});
