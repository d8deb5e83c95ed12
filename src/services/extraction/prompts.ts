/**
 * Pay Document Extraction Prompt
 *
 * @module services/extraction/prompts
 */

import { EXTRACTED_FIELD_NAMES } from '../../models/extraction.js';

/**
 * JSON shape the model is asked to return. Keys match ExtractedRecord.
 */
export const PAYSTUB_FIELD_GUIDE: Record<(typeof EXTRACTED_FIELD_NAMES)[number], string> = {
  employee_name: 'Full name of the employee (first and last name)',
  company_name: 'Name of the company or employer',
  annual_salary: 'Annual salary as a number, only if stated on the document',
  ssn: 'Social Security Number, last 4 digits only',
  pay_period: 'Pay frequency (weekly, bi-weekly, semi-monthly, monthly, daily)',
  gross_pay: 'Gross pay for this period as a number',
  net_pay: 'Net pay for this period as a number',
  deductions: 'List of deduction names (taxes, insurance, retirement, ...)',
  pay_date: 'Pay date, YYYY-MM-DD if possible',
  hourly_rate: 'Hourly rate as a number, if applicable',
  hours_worked: 'Hours worked this period, if applicable',
  year_to_date_gross: 'Year-to-date gross pay as a number',
  year_to_date_net: 'Year-to-date net pay as a number',
};

/**
 * Pay stub extraction prompt. Returns a single JSON object.
 */
export const PAYSTUB_EXTRACTION_PROMPT = `You are a financial document analyst. This image is a pay stub, payslip, earnings statement or similar income document.

Extract the following fields and return them as one JSON object:

${JSON.stringify(PAYSTUB_FIELD_GUIDE, null, 2)}

WHERE TO LOOK:
- Employee name: "Employee Name", "Name", "Payee", "Employee Summary" section, document header
- Employer: "Company", "Employer", "Payor", "Organization", letterhead
- Gross pay: "Gross Pay", "Gross Earnings", "Total Earnings", totals row of the earnings table
- Net pay: "Net Pay", "Take Home", "Employee Net Pay", "Total Net Payable"
- Pay period: "Pay Period", "Pay Frequency", "Pay Cycle"; a period written as a month ("March 2024") is monthly
- SSN: "SSN", "SS#", "Social Security Number"; patterns like XXX-XX-XXXX
- Year to date: "YTD Gross", "YTD Earnings", "YTD Net"

RULES:
1. Write amounts as plain numbers: no currency symbols, no thousands separators
2. Do not compute an annual salary yourself; leave annual_salary null unless the document states it
3. If several periods are shown, use the current one
4. If a field is missing or unreadable, set it to null
5. Return ONLY the JSON object, no markdown and no explanations`;
