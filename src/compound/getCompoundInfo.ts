import { Molecule } from 'openchemlib';

/** Formula and masses of a compound given as SMILES. */
export interface CompoundInfo {
  /** Canonical SMILES as written by OpenChemLib. */
  smiles: string;
  formula: string;
  /** Monoisotopic mass of the neutral molecule. */
  monoisotopicMass: number;
  /** Average molecular weight. */
  molecularWeight: number;
}

/**
 * Describe a predicted product from its SMILES.
 * @param smiles - SMILES of the compound.
 * @returns Formula and masses.
 * @throws {Error} If OpenChemLib cannot parse the SMILES.
 */
export function getCompoundInfo(smiles: string): CompoundInfo {
  let molecule: Molecule;
  try {
    molecule = Molecule.fromSmiles(smiles);
  } catch (error) {
    throw new Error(`Unable to parse SMILES "${smiles}"`, { cause: error });
  }

  const mf = molecule.getMolecularFormula();
  return {
    smiles: molecule.toSmiles(),
    formula: mf.formula,
    monoisotopicMass: mf.absoluteWeight,
    molecularWeight: mf.relativeWeight,
  };
}
