/**
 * Test Helpers
 *
 * Contract texts shared by the verifier tests.
 */

export const BASE_CONTRACT = `
Clause 1: The buyer pays the full price within 30 days.
Clause 2: The seller provides a 1-year warranty.
Clause 3: Disputes are settled in Oregon.
`;

export const REVISED_CONTRACT = `
Clause 1: The buyer pays the full price within 30 days.
Clause 2: The seller provides a 2-year warranty.
Clause 3: Disputes are settled in Oregon.
`;

export const EXTENDED_CONTRACT = `
Clause 1: The buyer pays the full price within 30 days.
Clause 2: The seller provides a 1-year warranty.
Clause 3: Disputes are settled in Oregon.
Clause 4: Notices are sent by email.
`;
