import { afterEach, describe, it, expect, vi } from 'vitest';
import { importFountain } from '@/lib/importers/fountain';
import { importFdx } from '@/lib/importers/fdx';

const fountainSample = `
Title: Demo

INT. APARTMENT - NIGHT
A room. Lights flicker.

ALEX
(quietly)
We test Fountain.

CUT TO:
EXT. STREET - DAY
Cars pass.

`.trim();

const fdxSample = `
<?xml version="1.0" encoding="UTF-8"?>
<FinalDraft DocumentType="Script" Template="No">
  <Content>
    <Paragraph Type="Scene Heading"><Text>INT. OFFICE - DAY</Text></Paragraph>
    <Paragraph Type="Action"><Text>A desk. A phone rings.</Text></Paragraph>
    <Paragraph Type="Character"><Text>SAM</Text></Paragraph>
    <Paragraph Type="Dialogue"><Text>Hello?</Text></Paragraph>
    <Paragraph Type="Transition"><Text>CUT TO:</Text></Paragraph>
    <Paragraph Type="Scene Heading"><Text>EXT. PARK - DAY</Text></Paragraph>
    <Paragraph Type="Action"><Text>Children play.</Text></Paragraph>
  </Content>
  <TitlePage>
    <Content>
      <Paragraph><Text>The Call</Text></Paragraph>
      <Paragraph><Text>Written by</Text></Paragraph>
      <Paragraph><Text>Jo Writer</Text></Paragraph>
      <Paragraph><Text>Draft: 2</Text></Paragraph>
    </Content>
  </TitlePage>
</FinalDraft>
`.trim();

const fdxDual = `
<FinalDraft DocumentType="Script">
  <Content>
    <Paragraph Type="Scene Heading"><Text>INT. GYM - NIGHT</Text></Paragraph>
    <Paragraph>
      <DualDialogue>
        <Paragraph Type="Character"><Text>BRICK</Text></Paragraph>
        <Paragraph Type="Dialogue"><Text>Now.</Text></Paragraph>
        <Paragraph Type="Character"><Text>STEEL</Text></Paragraph>
        <Paragraph Type="Dialogue"><Text Style="Bold+Italic">Never.</Text></Paragraph>
      </DualDialogue>
    </Paragraph>
  </Content>
</FinalDraft>
`.trim();

afterEach(() => {
  vi.restoreAllMocks();
});

describe('importFountain', () => {
  it('imports Fountain scenes and title page', async () => {
    const { parse, warnings } = await importFountain(fountainSample);
    expect(parse.titlePage).toEqual({ Title: 'Demo' });
    expect(parse.scenes.map(s => s.heading)).toEqual(['INT. APARTMENT - NIGHT', 'EXT. STREET - DAY']);
    expect(parse.characters.ALEX.dialogueCount).toBe(1);
    expect(warnings).toEqual([]);
  });

  it('warns about content before the first scene heading', async () => {
    const sample = `Prologue text before any heading.\n\nINT. LAB - NIGHT\nMachines hum.`;
    const { parse, warnings } = await importFountain(sample);
    expect(parse.scenes).toHaveLength(1);
    expect(warnings).toEqual(['Content before first scene heading detected near line 1; it is not part of any scene.']);
  });

  it('warns when there are no scene headings', async () => {
    const { parse, warnings } = await importFountain('A quiet field.\n\nBIRD\nTweet.');
    expect(parse.scenes).toEqual([]);
    expect(parse.characters.BIRD.sceneCount).toBe(0);
    expect(warnings).toEqual(['No scene headings found; the script has no scenes.']);
  });

  it('warns about an empty document', async () => {
    const { warnings } = await importFountain('');
    expect(warnings).toEqual(['No screenplay content found.']);
  });
});

describe('importFdx', () => {
  it('imports FDX scenes, characters and title page', () => {
    const { parse, warnings } = importFdx(fdxSample);
    expect(warnings).toEqual([]);
    expect(parse.titlePage).toEqual({ Title: 'The Call', Author: 'Jo Writer', Draft: '2' });
    expect(parse.elements.map(e => e.kind)).toEqual([
      'scene-heading',
      'action',
      'character-cue',
      'dialogue',
      'transition',
      'scene-heading',
      'action',
    ]);
    expect(parse.scenes).toHaveLength(2);
    expect(parse.scenes[0]).toMatchObject({
      heading: 'INT. OFFICE - DAY',
      location: 'INT. OFFICE',
      content: 'A desk. A phone rings.\nSAM\nHello?\nCUT TO:',
      dialogueLineCount: 1,
      actionLineCount: 1,
      characters: ['SAM'],
    });
    expect(parse.characters.SAM).toEqual({
      name: 'SAM',
      firstAppearanceLine: 3,
      lastAppearanceLine: 3,
      dialogueCount: 1,
      sceneCount: 1,
      scenes: ['INT. OFFICE - DAY'],
    });
  });

  it('flattens dual dialogue and reads run styles', () => {
    const { parse } = importFdx(fdxDual);
    expect(parse.elements.map(e => [e.kind, e.text])).toEqual([
      ['scene-heading', 'INT. GYM - NIGHT'],
      ['character-cue', 'BRICK'],
      ['dialogue', 'Now.'],
      ['dual-dialogue-cue', 'STEEL'],
      ['dialogue', 'Never.'],
    ]);
    expect(parse.elements[4].emphasis).toBe('bold-italic');
    expect(parse.scenes[0].characters).toEqual(['BRICK', 'STEEL']);
    expect(parse.scenes[0].dialogueLineCount).toBe(2);
    expect(parse.characters.STEEL.dialogueCount).toBe(1);
  });

  it('counts dialogue after a cue with an extension', () => {
    const xml =
      '<FinalDraft><Content>' +
      '<Paragraph Type="Scene Heading"><Text>INT. BOOTH - NIGHT</Text></Paragraph>' +
      '<Paragraph Type="Character"><Text>JOHN (V.O.)</Text></Paragraph>' +
      '<Paragraph Type="Dialogue"><Text>Testing.</Text></Paragraph>' +
      '</Content></FinalDraft>';
    const { parse } = importFdx(xml);
    expect(parse.scenes[0]).toMatchObject({
      dialogueLineCount: 1,
      actionLineCount: 0,
      characters: ['JOHN (V.O.)'],
    });
    expect(parse.characters['JOHN (V.O.)'].dialogueCount).toBe(1);
  });

  it('keeps the spaces between styled runs', () => {
    const xml =
      '<FinalDraft><Content>' +
      '<Paragraph Type="Scene Heading"><Text>INT. CAFE - DAY</Text></Paragraph>' +
      '<Paragraph Type="Action"><Text>She said </Text><Text Style="Bold">no</Text><Text> twice.</Text></Paragraph>' +
      '</Content></FinalDraft>';
    const { parse } = importFdx(xml);
    expect(parse.elements[1]).toMatchObject({ kind: 'action', text: 'She said no twice.', raw: 'She said no twice.' });
    expect(parse.scenes[0].wordCount).toBe(4);
  });

  it('keeps a __proto__ title entry as an ordinary key', () => {
    const xml =
      '<FinalDraft><Content/><TitlePage><Content>' +
      '<Paragraph><Text>__proto__: x</Text></Paragraph>' +
      '<Paragraph><Text>Draft: 3</Text></Paragraph>' +
      '</Content></TitlePage></FinalDraft>';
    const { parse } = importFdx(xml);
    expect(Object.entries(parse.titlePage)).toEqual([
      ['__proto__', 'x'],
      ['Draft', '3'],
    ]);
  });

  it('leaves dialogue without a cue unattributed', () => {
    const xml =
      '<FinalDraft><Content>' +
      '<Paragraph Type="Scene Heading"><Text>INT. HALL - NIGHT</Text></Paragraph>' +
      '<Paragraph Type="Dialogue"><Text>Who is there?</Text></Paragraph>' +
      '</Content></FinalDraft>';
    const { parse } = importFdx(xml);
    expect(parse.elements[1].kind).toBe('dialogue');
    expect(parse.characters).toEqual({});
  });

  it('reports a document without a FinalDraft root', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { parse, warnings } = importFdx('<Script><Content/></Script>');
    expect(warnings).toEqual(['Not a valid .fdx file (no <FinalDraft> root).']);
    expect(parse.scenes).toEqual([]);
    expect(spy).toHaveBeenCalledTimes(1);
  });
});
