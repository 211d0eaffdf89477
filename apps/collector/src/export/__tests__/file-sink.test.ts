import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { createMemoryLogger } from '@anistat/logger'
import { FileSink, OUTPUT_FILES, toCsv } from '../file-sink.js'
import { transform } from '../../pipeline/transform.js'
import { detailRecord } from '../../pipeline/__tests__/helpers.js'
import type { ListingRecord } from '../../scraper/types.js'

const listing: ListingRecord[] = [
  {
    id: 1,
    rank: 1,
    title: 'Lantern Keepers',
    url: 'https://myanimelist.net/anime/1/Lantern_Keepers',
    score: 9.1,
    mediaType: 'TV',
    episodeCount: 64,
    memberCount: 3456789,
  },
  {
    id: 2,
    rank: null,
    title: 'Paper, Moon',
    url: 'https://myanimelist.net/anime/2',
    score: null,
    mediaType: '',
    episodeCount: null,
    memberCount: null,
  },
]

describe('toCsv', () => {
  it('writes snake_case headers, empty cells for nulls and quotes commas', () => {
    const csv = toCsv(listing, [
      ['id', 'id'],
      ['rank', 'rank'],
      ['title', 'title'],
      ['episodeCount', 'episode_count'],
    ])
    expect(csv).toBe('id,rank,title,episode_count\n1,1,Lantern Keepers,64\n2,,"Paper, Moon",\n')
  })
})

describe('FileSink', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'anistat-sink-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes every non-empty table', async () => {
    const details = [
      detailRecord({
        reviews: [{ reviewer: 'alpha', date: '2024-02-01', score: 8, content: 'Good.', helpfulCount: 2 }],
      }),
    ]
    const outputDir = join(dir, 'nested', 'out')
    const { logger } = createMemoryLogger('test')
    const sink = new FileSink({ outputDir, logger })

    const written = await sink.write({ listing, details, tables: transform(details) })

    expect(written).toEqual([
      join(outputDir, OUTPUT_FILES.listing),
      join(outputDir, OUTPUT_FILES.details),
      join(outputDir, OUTPUT_FILES.facts),
      join(outputDir, OUTPUT_FILES.genres),
      join(outputDir, OUTPUT_FILES.studios),
      join(outputDir, OUTPUT_FILES.reviews),
    ])

    const facts = await readFile(join(outputDir, OUTPUT_FILES.facts), 'utf8')
    expect(facts.split('\n')[0]).toBe(
      'id,title,score,episodes,status,season,year,members,favorites,minutes_per_episode,' +
        'total_runtime_minutes,start_date,end_date,airing_status,broadcast_day,broadcast_time,url'
    )
    expect(facts.split('\n')[1]).toBe(
      '1,Lantern Keepers,9.1,64,Finished Airing,Spring,2009,3456789,223100,24,1536,' +
        '2009-04-05,2010-07-04,Finished Airing,Sunday,17:00,https://myanimelist.net/anime/1'
    )

    const genres = await readFile(join(outputDir, OUTPUT_FILES.genres), 'utf8')
    expect(genres).toBe('id,genre\n1,Action\n1,Adventure\n')

    const reviews = await readFile(join(outputDir, OUTPUT_FILES.reviews), 'utf8')
    expect(reviews).toBe('id,reviewer,date,score,content,helpful_count\n1,alpha,2024-02-01,8,Good.,2\n')

    const raw: unknown = JSON.parse(await readFile(join(outputDir, OUTPUT_FILES.details), 'utf8'))
    expect(raw).toEqual(details)
  })

  it('skips empty tables with a warning', async () => {
    const { logger, entries } = createMemoryLogger('test')
    const sink = new FileSink({ outputDir: dir, logger })

    const written = await sink.write({
      listing,
      details: [],
      tables: { facts: [], genreEdges: [], studioEdges: [], reviewEdges: [] },
    })

    expect(written).toEqual([join(dir, OUTPUT_FILES.listing)])
    expect(await readdir(dir)).toEqual([OUTPUT_FILES.listing])
    expect(entries.filter(e => e.level === 'warn').map(e => e.file)).toEqual([
      OUTPUT_FILES.details,
      OUTPUT_FILES.facts,
      OUTPUT_FILES.genres,
      OUTPUT_FILES.studios,
      OUTPUT_FILES.reviews,
    ])
  })
})
