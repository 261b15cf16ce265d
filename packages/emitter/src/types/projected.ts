/**
 * Result of projecting one type into a dialect
 */

export type ProjectedType =
  | {
      readonly kind: "text";
      readonly text: string;
      /** Optionality was present but the target spelling cannot show it */
      readonly droppedOptionality: boolean;
    }
  | { readonly kind: "unrepresentable"; readonly description: string };

export const unrepresentable = (description: string): ProjectedType => ({
  kind: "unrepresentable",
  description,
});

/**
 * Inert comment standing in for a type that has no spelling.
 * The description is rewritten so it cannot close the comment early.
 */
export const renderPlaceholder = (description: string): string => {
  const inert = description
    .replace(/\*\//g, "* /")
    .replace(/\r?\n/g, " ");
  return `/* ${inert} */`;
};

export const renderProjectedType = (projected: ProjectedType): string =>
  projected.kind === "text"
    ? projected.text
    : renderPlaceholder(projected.description);
