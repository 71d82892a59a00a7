import path from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { artifacts } from "../constants";
import type { AnalysisTask } from "../types/job";
import { AnalysisInputError, fileExists, readText, writeJson } from "./io";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  attributesGroupName: "attributes",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name) => name === "orbital",
});

const textNode = z.union([
  z.string(),
  z.object({ "#text": z.string().optional() }).passthrough(),
]);

const pdosSchema = z.object({
  pdos: z.object({
    nspin: textNode,
    fermi_energy: textNode.optional(),
    energy_values: textNode,
    orbital: z
      .array(
        z.object({
          attributes: z.record(z.string()).optional(),
          data: textNode.optional(),
        }),
      )
      .default([]),
  }),
});

function text(node: z.infer<typeof textNode> | undefined) {
  if (node === undefined) {
    return "";
  }
  return typeof node === "string" ? node : node["#text"] ?? "";
}

function numbers(value: string, source: string, what: string) {
  const values = value.trim() ? value.trim().split(/\s+/).map(Number) : [];
  if (!values.every(Number.isFinite)) {
    throw new AnalysisInputError(source, `${what} holds non-numeric values`);
  }
  return values;
}

export interface PdosOrbital {
  [attribute: string]: string | number[];
  values: number[];
}

export interface PdosDocument {
  nspin: number;
  fermi_energy: number | null;
  energy_values: number[];
  orbitals: PdosOrbital[];
}

/**
 * Converts a PDOS XML document to JSON. Each orbital must carry
 * `nspin × energy points` samples.
 */
export function parsePdos(xml: string, source: string): PdosDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new AnalysisInputError(source, `invalid XML at line ${valid.err.line}: ${valid.err.msg}`);
  }
  const parsed = pdosSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new AnalysisInputError(source, `${issue.path.join(".")}: ${issue.message}`);
  }
  const root = parsed.data.pdos;

  const nspin = Number.parseInt(text(root.nspin), 10);
  if (!Number.isInteger(nspin) || nspin < 1) {
    throw new AnalysisInputError(source, "nspin not found or invalid");
  }
  const fermiText = text(root.fermi_energy).trim();
  const fermiEnergy = fermiText ? Number(fermiText) : null;
  const energyValues = numbers(text(root.energy_values), source, "energy_values");

  const orbitals = root.orbital.map((orbital, index) => {
    const attributes = orbital.attributes ?? {};
    const values = numbers(text(orbital.data), source, `orbital ${attributes.index ?? index + 1}`);
    if (values.length !== energyValues.length * nspin) {
      throw new AnalysisInputError(
        source,
        `orbital ${JSON.stringify(attributes)} has ${values.length} samples, expected ${energyValues.length * nspin}`,
      );
    }
    return { ...attributes, values };
  });

  return {
    nspin,
    fermi_energy: fermiEnergy !== null && Number.isFinite(fermiEnergy) ? fermiEnergy : null,
    energy_values: energyValues,
    orbitals,
  };
}

export const pdosTask: AnalysisTask = {
  name: "pdos",
  requiredInputs: [],
  async run({ workDir }) {
    const source = path.join(workDir, artifacts.pdos);
    // PDOS is only written when it was requested.
    if (!(await fileExists(source))) {
      return null;
    }
    const document = parsePdos(await readText(source), source);
    return writeJson(path.join(workDir, artifacts.pdosJson), document, 4);
  },
};
