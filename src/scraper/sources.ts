import type { SourceDefinition } from "../types/index.js";

const BASE_URL =
  "https://infra.datos.gob.ar/catalog/sspm/dataset/145/distribution";

/**
 * Consumer price series published as wide monthly CSV tables.
 *
 * Incidence tables carry percentage-point contributions per breakdown axis;
 * the index table carries index levels from which month-over-month variation
 * is computed. Priorities decide which source wins a shared metric slot.
 */
export const IPC_SOURCES: readonly SourceDefinition[] = [
  {
    id: "incidence-analytical",
    description: "Incidence by analytical category (core, regulated, seasonal)",
    url: `${BASE_URL}/145.12/download/ipc-incidencia-categorias-nivel-general.csv`,
    axis: "analytical",
    measure: "incidence",
    priority: 20,
    seriesPrefix: "ipc",
  },
  {
    id: "incidence-divisions",
    description: "Absolute monthly incidence by region and division",
    url: `${BASE_URL}/145.10/download/ipc-incidencia-absoluta-mensual-region-capitulo.csv`,
    axis: "divisions",
    measure: "incidence",
    priority: 10,
    seriesPrefix: "ipc",
  },
  {
    id: "incidence-nature",
    description: "Monthly incidence of goods and services",
    url: `${BASE_URL}/145.11/download/ipc-incidencia-mensual-bienes-servicios.csv`,
    axis: "nature",
    measure: "incidence",
    priority: 5,
    seriesPrefix: "ipc",
  },
  {
    id: "index-analytical",
    description: "Index levels by region and analytical category",
    url: `${BASE_URL}/145.3/download/indice-precios-al-consumidor-nivel-general-base-diciembre-2016-mensual.csv`,
    axis: "analytical",
    measure: "index",
    priority: 30,
    seriesPrefix: "ipc",
  },
];
