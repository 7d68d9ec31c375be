/**
 * Turns a class-like identifier into a lowercase, underscore-delimited token.
 *
 * A run of capitals followed by a lowercase letter splits before the last capital
 * of the run, and a lowercase letter or digit followed by a capital always splits.
 *
 * @example
 * deriveName("HTTPServer"); // "http_server"
 * deriveName("MedicationExtractionWorkflow"); // "medication_extraction_workflow"
 * deriveName("Workflow2024"); // "workflow2024"
 */
export function deriveName(identifier: string): string {
  return identifier
    .replace(/(.)([A-Z][a-z]+)/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
}
