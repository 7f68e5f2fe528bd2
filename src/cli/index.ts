/**
 * panchang CLI
 *
 *   panchang                       Lunisolar panchang for the current month
 *   panchang -y 2025 -m 1 -d 18    Single-day report
 *   panchang -s tamil -y 2025 -m 4 Tamil solar calendar for April 2025
 *   panchang -l 13.08,80.27 -u 5.5 Another location
 */

import type { CliRequest } from './args.js'
import type { SolarCalendarVariant } from '../types.js'
import { RASHI_NAMES, WEEKDAY_NAMES, WEEKDAY_SHORT } from '../types.js'
import { USAGE, parseCliArgs } from './args.js'
import { CalendarSession, localCivilDate } from '../api/index.js'
import { NEW_DELHI } from '../config/index.js'
import { formatCivilDate, formatDayReport, formatMonthTable } from '../panchang/index.js'
import { SOLAR_CALENDARS, formatSolarDate, solarMonthName } from '../solar/index.js'
import { civilDateToJD, dateToJD, dayOfWeek, daysInMonth } from '../time/index.js'

async function main() {
  const command = parseCliArgs(process.argv.slice(2), localCivilDate(dateToJD(new Date())), NEW_DELHI)

  switch (command.kind) {
    case 'help':
      console.log(USAGE)
      return
    case 'error':
      console.error(command.message)
      console.error(USAGE)
      process.exit(1)
      return
    case 'run':
      run(command.request)
  }
}

function run(request: CliRequest) {
  const { year, month, day, calendar } = request
  if (day !== undefined && day > daysInMonth(year, month)) {
    throw new RangeError(`${year}-${month} has ${daysInMonth(year, month)} days, got ${day}`)
  }

  const session = new CalendarSession({ location: request.location })

  if (calendar !== undefined) {
    if (day !== undefined) printSolarDay(session, year, month, day, calendar)
    else printSolarMonth(session, year, month, calendar)
  } else if (day !== undefined) {
    const report = formatDayReport(session.panchang({ year, month, day }), session.location)
    for (const line of report) console.log(line)
  } else {
    const { latitude, longitude, utcOffset } = session.location
    const sign = utcOffset >= 0 ? '+' : '-'
    console.log(
      `Hindu Calendar — ${formatCivilDate({ year, month, day: 1 }).slice(0, 7)} ` +
      `(${latitude.toFixed(4)}°N, ${longitude.toFixed(4)}°E, UTC${sign}${Math.abs(utcOffset).toFixed(1)})\n`,
    )
    for (const line of formatMonthTable(session.monthPanchang(year, month), session.location)) console.log(line)
  }
}

function printSolarMonth(session: CalendarSession, year: number, month: number, calendar: SolarCalendarVariant) {
  const days = session.solarMonth(year, month, calendar)
  const first = days[0]
  console.log(`${SOLAR_CALENDARS[calendar].label} Solar Calendar — ${first.monthName} ${first.year} (${first.era})`)
  console.log(`Gregorian ${formatCivilDate({ year, month, day: 1 }).slice(0, 7)}\n`)
  console.log(`${'Date'.padEnd(12)} ${'Day'.padEnd(5)} Solar Date`)
  console.log(`${'----------'.padEnd(12)} ${'---'.padEnd(5)} --------------------`)

  days.forEach((sd, i) => {
    const date = { year, month, day: i + 1 }
    const dow = WEEKDAY_SHORT[dayOfWeek(civilDateToJD(date))]
    console.log(`${formatCivilDate(date).padEnd(12)} ${dow.padEnd(5)} ${solarMonthName(sd.month, calendar)} ${sd.day}, ${sd.year}`)
  })
}

function printSolarDay(session: CalendarSession, year: number, month: number, day: number, calendar: SolarCalendarVariant) {
  const date = { year, month, day }
  const sd = session.solarDate(date, calendar)
  console.log(`Date:         ${formatCivilDate(date)} (${WEEKDAY_NAMES[dayOfWeek(civilDateToJD(date))]})`)
  console.log(`Calendar:     ${SOLAR_CALENDARS[calendar].label} Solar`)
  console.log(`Solar Date:   ${formatSolarDate(sd, calendar)}`)
  console.log(`Rashi:        ${RASHI_NAMES[sd.rashi - 1]}`)
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
})
