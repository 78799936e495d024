import { useEffect, useMemo, useRef, useState } from 'react'
import * as d3 from 'd3'
import { feature } from 'topojson-client'
import type { GeometryCollection, Topology } from 'topojson-specification'
import type { ChartSpec } from './chartSpecs'
import type { ChartRecord } from './panelData'

interface ChoroplethMapProps {
  spec: ChartSpec
  records: readonly ChartRecord[]
}

type WorldTopology = Topology<{ countries: GeometryCollection<{ name: string }> }>

const toCountries = (world: WorldTopology) => feature(world, world.objects.countries)

type CountryCollection = ReturnType<typeof toCountries>

const NO_DATA_COLOR = '#eeeeee'
const formatValue = d3.format(',.0f')

export default function ChoroplethMap({ spec, records }: ChoroplethMapProps) {
  const svgRef = useRef<SVGSVGElement>(null)
  const [countries, setCountries] = useState<CountryCollection | null>(null)
  const [error, setError] = useState<string | null>(null)
  const [hovered, setHovered] = useState<{ name: string; value: number | null } | null>(null)

  const atlasUrl = spec.geometry?.url
  const lookup = spec.transform?.[0]
  const colorField = spec.encoding.color && 'field' in spec.encoding.color ? spec.encoding.color.field : null

  useEffect(() => {
    if (!atlasUrl) return
    let cancelled = false

    const load = async () => {
      try {
        const response = await fetch(atlasUrl)
        if (!response.ok) {
          throw new Error(`Failed to load world map (${response.status})`)
        }
        const world = (await response.json()) as WorldTopology
        if (cancelled) return
        setCountries(toCountries(world))
      } catch (loadError) {
        if (cancelled) return
        console.error('Failed to load world map:', loadError)
        setError(loadError instanceof Error ? loadError.message : String(loadError))
      }
    }

    void load()

    return () => {
      cancelled = true
    }
  }, [atlasUrl])

  const valueById = useMemo(() => {
    const map = new Map<number, number>()
    if (!lookup || !colorField) return map
    records.forEach(record => {
      const id = record[lookup.from.key]
      const value = record[colorField]
      if (typeof id === 'number' && typeof value === 'number') map.set(id, value)
    })
    return map
  }, [colorField, lookup, records])

  useEffect(() => {
    if (!svgRef.current || !countries) return

    const { width, height } = spec
    const svg = d3.select(svgRef.current)
    svg.selectAll('*').remove()
    svg.attr('width', width).attr('height', height)

    const projection = d3.geoEquirectangular().fitSize([width, height], countries)
    const path = d3.geoPath(projection)

    const [min, max] = d3.extent(Array.from(valueById.values()))
    const color = d3.scaleSequential(d3.interpolateYlOrRd).domain([min ?? 0, max ?? 1])

    const valueOf = (id: string | number | undefined): number | null => {
      const numericId = Number(id)
      return Number.isFinite(numericId) ? valueById.get(numericId) ?? null : null
    }

    svg.append('g')
      .selectAll('path')
      .data(countries.features)
      .join('path')
      .attr('d', path)
      .attr('fill', country => {
        const value = valueOf(country.id)
        return value === null ? NO_DATA_COLOR : color(value)
      })
      .attr('stroke', spec.mark.stroke ?? 'white')
      .attr('stroke-width', 0.5)
      .on('mouseover', (_event, country) => {
        setHovered({ name: country.properties.name, value: valueOf(country.id) })
      })
      .on('mouseout', () => setHovered(null))
  }, [countries, spec, valueById])

  if (error) return <div className="error">Error: {error}</div>

  return (
    <div className="chart-wrapper">
      {spec.title && <h4 className="chart-title">{spec.title}</h4>}
      <svg ref={svgRef} className="choropleth-svg"></svg>
      <div className="map-readout">
        {hovered
          ? `${hovered.name}: ${hovered.value === null ? 'N/A' : formatValue(hovered.value)}`
          : 'Hover a country'}
      </div>
    </div>
  )
}
