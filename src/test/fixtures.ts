/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Small GAEB DA XML documents for tests.
*/

import * as path from 'path';
import type { Phase } from '../boq/types';

export interface ItemFixture {
  rNoPart: string;
  id?: string;
  qty?: string;
  unit?: string;
  unitPrice?: string;
  totalPrice?: string;
  text?: string;
  longText?: string;
}

export interface CategoryFixture {
  rNoPart: string;
  id?: string;
  title?: string;
  children: BodyFixture[];
}

export type BodyFixture = CategoryFixture | ItemFixture;

export interface DocumentOptions {
  project?: string;
  currency?: string;
  boqName?: string;
  /** DP element content; null leaves the element out. Defaults to 83/84 by phase. */
  dp?: string | null;
  /** Root namespace; null leaves it out. Defaults to the DA83/DA84 namespace by phase. */
  namespace?: string | null;
}

function isCategory(node: BodyFixture): node is CategoryFixture {
  return 'children' in node;
}

function escapeXml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function idAttr(id: string | undefined): string {
  return id === undefined ? '' : ` ID="${escapeXml(id)}"`;
}

function element(name: string, text: string | undefined): string {
  return text === undefined ? '' : `<${name}>${escapeXml(text)}</${name}>`;
}

function itemXml(item: ItemFixture): string {
  const outline =
    item.text === undefined
      ? ''
      : `<OutlineText><OutlTxt><TextOutlTxt><span>${escapeXml(item.text)}</span></TextOutlTxt></OutlTxt></OutlineText>`;
  const detail =
    item.longText === undefined ? '' : `<DetailTxt><Text><p>${escapeXml(item.longText)}</p></Text></DetailTxt>`;
  return (
    `<Item RNoPart="${escapeXml(item.rNoPart)}"${idAttr(item.id)}>` +
    element('Qty', item.qty) +
    element('QU', item.unit) +
    element('UP', item.unitPrice) +
    element('IT', item.totalPrice) +
    (outline || detail ? `<Description><CompleteText>${outline}${detail}</CompleteText></Description>` : '') +
    '</Item>'
  );
}

function bodyXml(children: BodyFixture[]): string {
  let xml = '';
  let items: ItemFixture[] = [];
  const flushItems = () => {
    if (items.length > 0) xml += `<Itemlist>${items.map(itemXml).join('')}</Itemlist>`;
    items = [];
  };
  for (const child of children) {
    if (isCategory(child)) {
      flushItems();
      xml +=
        `<BoQCtgy RNoPart="${escapeXml(child.rNoPart)}"${idAttr(child.id)}>` +
        element('LblTx', child.title) +
        `<BoQBody>${bodyXml(child.children)}</BoQBody></BoQCtgy>`;
    } else {
      items.push(child);
    }
  }
  flushItems();
  return xml;
}

export function gaebNamespace(code: string): string {
  return `http://www.gaeb.de/GAEB_DA_XML/DA${code}/3.2`;
}

/** A complete document holding one BoQ with `body` below its root. */
export function gaebXml(phase: Phase, body: BodyFixture[], options: DocumentOptions = {}): string {
  const code = phase === 'A' ? '83' : '84';
  const dp = options.dp === undefined ? code : options.dp;
  const namespace = options.namespace === undefined ? gaebNamespace(code) : options.namespace;
  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    `<GAEB${namespace === null ? '' : ` xmlns="${namespace}"`}>` +
    '<GAEBInfo><Version>3.2</Version></GAEBInfo>' +
    (options.project === undefined ? '' : `<PrjInfo>${element('NamePrj', options.project)}</PrjInfo>`) +
    '<Award>' +
    (dp === null ? '' : element('DP', dp)) +
    (options.currency === undefined ? '' : `<AwardInfo>${element('Cur', options.currency)}</AwardInfo>`) +
    '<BoQ>' +
    (options.boqName === undefined ? '' : `<BoQInfo>${element('Name', options.boqName)}</BoQInfo>`) +
    `<BoQBody>${bodyXml(body)}</BoQBody>` +
    '</BoQ></Award></GAEB>'
  );
}

export function fixturePath(name: string): string {
  return path.join(__dirname, 'fixtures', name);
}
