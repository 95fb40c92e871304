/**
 * HKEX page and workbook fixtures
 */

import * as XLSX from 'xlsx';

/** Single-sheet .xlsx from rows of cells */
export function buildWorkbook(rows: unknown[][]): Buffer {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Sheet1');
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return data;
}

export const LISTING_REPORT_ROWS: unknown[][] = [
  ['New Listing Report 2025'],
  ['No.', 'Stock Code', 'Company Name', 'Prospectus Date', 'Listing Date', 'Sponsor', 'Board', 'Shares', 'Funds Raised (HK$)', 'Subscription Price (HK$)'],
  [1, 2617, 'Alpha Biotech Holdings Limited', '06/01/2025', '14/01/2025', 'Placeholder Capital', 'Main', 1000, 780000000, 12.5],
  [2, '', 'Missing Code Limited', '07/01/2025', '15/01/2025', null, null, null, null, null],
  [3, '9988', 'Kappa Retail Group', '10/02/2025', '18/02/2025', null, null, null, '-', null],
];

export const APPLICATION_INDEX_ROWS: unknown[][] = [
  ['Date of First Posting', 'Applicant', 'Status'],
  ['20/02/2025', 'Beta Robotics Co., Ltd. - B', 'Active'],
  ['03/02/2025', 'Gamma Foods Limited', 'Withdrawn'],
  ['', 'Undated Applicant Limited', 'Active'],
];

export const NEW_LISTING_PAGE = `
<html><body>
  <a href="/-/media/HKEXnews/Homepage/New-Listings/New-Listing-Information/New-Listing-Report/Main/NLR2024_Eng.xlsx">2024</a>
  <a href="/-/media/HKEXnews/Homepage/New-Listings/New-Listing-Information/New-Listing-Report/Main/NLR2025_Eng.xlsx">2025</a>
  <a href="/-/media/HKEXnews/Homepage/Other/Guide.pdf">Guide</a>
  <table>
    <tr><th>Stock Code</th><th>Stock Name</th><th>Announcement</th><th>Prospectus</th><th>Allotment Results</th></tr>
    <tr>
      <td>02617</td>
      <td>ALPHA BIOTECH HOLDINGS</td>
      <td><a href="/listedco/listconews/sehk/2025/0106/ann.pdf">Announcement</a></td>
      <td><a href="/listedco/listconews/sehk/2025/0106/prospectus.pdf">Prospectus</a></td>
      <td></td>
    </tr>
  </table>
</body></html>`;
