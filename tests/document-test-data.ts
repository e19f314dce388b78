import JSZip from 'jszip';
import sharp from 'sharp';

const RELS_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const REL_TYPE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export interface WordFileOptions {
  /** Inner XML of w:body */
  body: string;
  /** Relationship id -> part name under word/media */
  media?: Record<string, { name: string; bytes: Uint8Array }>;
  pages?: number;
}

export interface ExcelFileOptions {
  sheets: SheetOptions[];
  sharedStrings?: string[];
  /** Inner XML of styleSheet */
  styles?: string;
}

export interface SheetOptions {
  name: string;
  /** Inner XML of sheetData */
  sheetData: string;
}

function relationships(entries: string[]): string {
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Relationships xmlns="${RELS_NS}">${entries.join('')}</Relationships>`;
}

function relationship(id: string, type: string, target: string): string {
  return `<Relationship Id="${id}" Type="${REL_TYPE}/${type}" Target="${target}"/>`;
}

export async function generateWordFile(options: WordFileOptions): Promise<Uint8Array> {
  const zip = new JSZip();

  zip.file(
    '[Content_Types].xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Default Extension="png" ContentType="image/png"/>
  <Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>
</Types>`
  );

  const rootRels = [relationship('rId1', 'officeDocument', 'word/document.xml')];
  if (options.pages !== undefined) {
    rootRels.push(relationship('rId2', 'extended-properties', 'docProps/app.xml'));
    zip.file(
      'docProps/app.xml',
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Properties xmlns="http://schemas.openxmlformats.org/officeDocument/2006/extended-properties"><Pages>${options.pages}</Pages></Properties>`
    );
  }
  zip.file('_rels/.rels', relationships(rootRels));

  const documentRels: string[] = [];
  for (const [id, { name, bytes }] of Object.entries(options.media ?? {})) {
    documentRels.push(relationship(id, 'image', `media/${name}`));
    zip.file(`word/media/${name}`, bytes);
  }
  zip.file('word/_rels/document.xml.rels', relationships(documentRels));

  zip.file(
    'word/document.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships" xmlns:wp="http://schemas.openxmlformats.org/drawingml/2006/wordprocessingDrawing" xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" xmlns:pic="http://schemas.openxmlformats.org/drawingml/2006/picture"><w:body>${options.body}</w:body></w:document>`
  );

  return zip.generateAsync({ type: 'uint8array' });
}

export async function generateExcelFile(options: ExcelFileOptions): Promise<Uint8Array> {
  const zip = new JSZip();

  const sheetOverrides = options.sheets
    .map(
      (_, i) =>
        `<Override PartName="/xl/worksheets/sheet${i + 1}.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.worksheet+xml"/>`
    )
    .join('');

  zip.file(
    '[Content_Types].xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">
  <Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>
  <Default Extension="xml" ContentType="application/xml"/>
  <Override PartName="/xl/workbook.xml" ContentType="application/vnd.openxmlformats-officedocument.spreadsheetml.sheet.main+xml"/>
  ${sheetOverrides}
</Types>`
  );

  zip.file('_rels/.rels', relationships([relationship('rId1', 'officeDocument', 'xl/workbook.xml')]));

  const workbookRels = options.sheets.map((_, i) =>
    relationship(`rId${i + 1}`, 'worksheet', `worksheets/sheet${i + 1}.xml`)
  );
  if (options.sharedStrings) {
    workbookRels.push(relationship('rIdStrings', 'sharedStrings', 'sharedStrings.xml'));
    const items = options.sharedStrings.map((s) => `<si><t xml:space="preserve">${s}</t></si>`).join('');
    zip.file(
      'xl/sharedStrings.xml',
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<sst xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" count="${options.sharedStrings.length}">${items}</sst>`
    );
  }
  if (options.styles) {
    workbookRels.push(relationship('rIdStyles', 'styles', 'styles.xml'));
    zip.file(
      'xl/styles.xml',
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<styleSheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main">${options.styles}</styleSheet>`
    );
  }
  zip.file('xl/_rels/workbook.xml.rels', relationships(workbookRels));

  const sheetEntries = options.sheets
    .map((sheet, i) => `<sheet name="${sheet.name}" sheetId="${i + 1}" r:id="rId${i + 1}"/>`)
    .join('');
  zip.file(
    'xl/workbook.xml',
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<workbook xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main" xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"><sheets>${sheetEntries}</sheets></workbook>`
  );

  options.sheets.forEach((sheet, i) => {
    zip.file(
      `xl/worksheets/sheet${i + 1}.xml`,
      `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<worksheet xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"><sheetData>${sheet.sheetData}</sheetData></worksheet>`
    );
  });

  return zip.generateAsync({ type: 'uint8array' });
}

/**
 * Solid-colour PNG
 */
export async function generatePng(width: number, height: number, r: number, g: number, b: number): Promise<Uint8Array> {
  const png = await sharp({ create: { width, height, channels: 3, background: { r, g, b } } }).png().toBuffer();
  return new Uint8Array(png);
}

export function paragraph(text: string, runProperties = ''): string {
  const rPr = runProperties ? `<w:rPr>${runProperties}</w:rPr>` : '';
  return `<w:p><w:r>${rPr}<w:t xml:space="preserve">${text}</w:t></w:r></w:p>`;
}

export function anchoredPicture(relId: string, x: number, y: number): string {
  return (
    '<w:p><w:r><w:drawing><wp:anchor>' +
    `<wp:positionH relativeFrom="column"><wp:posOffset>${x}</wp:posOffset></wp:positionH>` +
    `<wp:positionV relativeFrom="paragraph"><wp:posOffset>${y}</wp:posOffset></wp:positionV>` +
    '<a:graphic><a:graphicData><pic:pic><pic:blipFill>' +
    `<a:blip r:embed="${relId}"/>` +
    '</pic:blipFill></pic:pic></a:graphicData></a:graphic>' +
    '</wp:anchor></w:drawing></w:r></w:p>'
  );
}
