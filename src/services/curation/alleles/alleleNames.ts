/**
 * @fileoverview MHC allele-name canonicalization.
 * Accepts the spellings that appear across binding-assay and mass-spec
 * datasets ("HLA-A0201", "A*02:01", "H2-Kb", ...) and renders them as
 * `SPECIES-GENE*FAMILY:PROTEIN` (or `H-2-<gene><haplotype>` for mouse).
 * @module src/services/curation/alleles/alleleNames
 */

export class AlleleParseError extends Error {
  constructor(
    public readonly raw: string,
    reason: string,
  ) {
    super(`Cannot parse allele name "${raw}": ${reason}`);
    this.name = 'AlleleParseError';
    Object.setPrototypeOf(this, AlleleParseError.prototype);
  }
}

export interface ParsedAllele {
  species: string;
  gene: string;
  /** Allele group; empty for mouse haplotype names. */
  family: string;
  /** Specific protein; for mouse, the haplotype letters. */
  protein: string;
  /** Expression suffix such as `N` or `L`, or empty. */
  suffix: string;
}

const MOUSE = 'H-2';
const HUMAN = 'HLA';

/**
 * Lower-cased prefix spelling → canonical species prefix.
 */
const SPECIES_PREFIXES: ReadonlyMap<string, string> = new Map([
  ['hla', HUMAN],
  ['h-2', MOUSE],
  ['h2', MOUSE],
  ['mamu', 'Mamu'],
  ['mafa', 'Mafa'],
  ['mane', 'Mane'],
  ['patr', 'Patr'],
  ['gogo', 'Gogo'],
  ['popy', 'Popy'],
  ['bola', 'BoLA'],
  ['sla', 'SLA'],
  ['dla', 'DLA'],
  ['eqca', 'Eqca'],
  ['ovar', 'Ovar'],
  ['gaga', 'Gaga'],
  ['rano', 'RT1'],
  ['rt1', 'RT1'],
]);

// longest first so "h-2" wins over "h2"-style partial overlaps
const PREFIX_SPELLINGS = [...SPECIES_PREFIXES.keys()].sort(
  (a, b) => b.length - a.length,
);

/**
 * Retired HLA gene spellings still found in older datasets.
 */
const HLA_GENE_ALIASES: ReadonlyMap<string, string> = new Map([['CW', 'C']]);

const MOUSE_NAME = /^([KDLQTM])-?([A-Z]{1,3})$/i;
const SEPARATED_FIELDS = /^(\d{2,3}):(\d{2,3})(?::\d{2,3}){0,2}([NLSCAQ]?)$/i;
const COMPACT_FIELDS = /^(\d{4,6})([NLSCAQ]?)$/i;
const STARRED_GENE = /^[A-Z0-9]+$/i;
const BARE_GENE = /^([A-Z]+)(\d.*)$/i;

function splitSpecies(name: string): { species: string; rest: string } {
  const lower = name.toLowerCase();
  for (const spelling of PREFIX_SPELLINGS) {
    if (lower.startsWith(`${spelling}-`)) {
      const species = SPECIES_PREFIXES.get(spelling) ?? HUMAN;
      return { species, rest: name.slice(spelling.length + 1) };
    }
  }
  return { species: HUMAN, rest: name };
}

function splitCompactDigits(
  species: string,
  digits: string,
): { family: string; protein: string } {
  if (species === HUMAN) {
    // HLA: two-digit group; a five-digit run carries a three-digit protein
    const proteinLength = digits.length === 5 ? 3 : 2;
    return {
      family: digits.slice(0, 2),
      protein: digits.slice(2, 2 + proteinLength),
    };
  }
  if (digits.length === 4) {
    return { family: digits.slice(0, 2), protein: digits.slice(2) };
  }
  return { family: digits.slice(0, 3), protein: digits.slice(3, 6) };
}

function parseFields(
  raw: string,
  species: string,
  allelePart: string,
): Pick<ParsedAllele, 'family' | 'protein' | 'suffix'> {
  const separated = SEPARATED_FIELDS.exec(allelePart);
  if (separated) {
    return {
      family: separated[1] ?? '',
      protein: separated[2] ?? '',
      suffix: (separated[3] ?? '').toUpperCase(),
    };
  }

  const compact = COMPACT_FIELDS.exec(allelePart);
  if (compact) {
    return {
      ...splitCompactDigits(species, compact[1] ?? ''),
      suffix: (compact[2] ?? '').toUpperCase(),
    };
  }

  throw new AlleleParseError(
    raw,
    `unrecognized allele fields "${allelePart}"`,
  );
}

/**
 * Parses a free-text allele name.
 *
 * @throws {AlleleParseError} when the name is empty, serotype-level
 *   ("HLA-A2"), class-level ("HLA class I") or otherwise not an allele.
 */
export function parseAlleleName(raw: string): ParsedAllele {
  const name = raw.trim().replace(/\s+/g, '-').replace(/-{2,}/g, '-');
  if (name.length === 0) {
    throw new AlleleParseError(raw, 'empty name');
  }

  const { species, rest } = splitSpecies(name);

  if (species === MOUSE) {
    const match = MOUSE_NAME.exec(rest);
    if (!match) {
      throw new AlleleParseError(raw, `unrecognized mouse allele "${rest}"`);
    }
    return {
      species,
      gene: (match[1] ?? '').toUpperCase(),
      family: '',
      protein: (match[2] ?? '').toLowerCase(),
      suffix: '',
    };
  }

  let gene: string;
  let allelePart: string;
  const star = rest.indexOf('*');
  if (star >= 0) {
    gene = rest.slice(0, star);
    allelePart = rest.slice(star + 1);
    if (!STARRED_GENE.test(gene)) {
      throw new AlleleParseError(raw, `invalid gene "${gene}"`);
    }
  } else {
    const bare = BARE_GENE.exec(rest);
    if (!bare) {
      throw new AlleleParseError(raw, 'missing allele fields');
    }
    gene = bare[1] ?? '';
    allelePart = bare[2] ?? '';
  }

  const upperGene = gene.toUpperCase();
  return {
    species,
    gene:
      species === HUMAN
        ? (HLA_GENE_ALIASES.get(upperGene) ?? upperGene)
        : upperGene,
    ...parseFields(raw, species, allelePart),
  };
}

export function formatAllele(parsed: ParsedAllele): string {
  if (parsed.species === MOUSE) {
    return `${MOUSE}-${parsed.gene}${parsed.protein}`;
  }
  return `${parsed.species}-${parsed.gene}*${parsed.family}:${parsed.protein}${parsed.suffix}`;
}
