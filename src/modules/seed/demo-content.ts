import { Event } from '../event/event.schema';
import { OwnerProfile } from '../owner/owner-profile.schema';
import { Theater } from '../theater/theater.schema';
import { Video } from '../video/video.schema';
import { toMonthKey } from '../video/month-key';

export interface DemoContent {
  theater: Theater;
  owners: OwnerProfile[];
  events: Event[];
  video: Video;
}

/**
 * UTC timestamp on the same month as `base`, at the given day and time
 */
function atUtc(base: Date, day: number, hours: number, minutes: number): Date {
  return new Date(
    Date.UTC(base.getUTCFullYear(), base.getUTCMonth(), day, hours, minutes),
  );
}

/**
 * Demo content for previews. Event dates are derived from `now` so a
 * freshly seeded database always shows a current program.
 */
export function buildDemoContent(now: Date): DemoContent {
  const today = now.getUTCDate();

  return {
    theater: {
      name: 'Kleinkunstbühne am Naschmarkt',
      tagline: 'Schmäh, Chanson und ein Glas Gemischter Satz.',
      story:
        'Aus einem ehemaligen Weinkeller wurde eine Bühne für siebzig Gäste. ' +
        'Seit der ersten Spielzeit wechseln sich hier Kabarett, Improvisation ' +
        'und Liederabende ab, gespielt von einem kleinen Ensemble und vielen Gästen.',
      address: 'Rechte Wienzeile 31, 1040 Wien',
      phone: '+43 1 555 01 23',
      email: 'hallo@kleinkunst-naschmarkt.example',
      opening_hours: 'Mi–Sa ab 18:30',
      transport_howto: 'U4 Kettenbrückengasse, Ausgang Naschmarkt, 3 Minuten zu Fuß',
    },
    owners: [
      {
        name: 'Resi Hofbauer',
        role: 'Intendanz & Bühne',
        bio: 'Kabarettistin und Autorin. Schreibt die Hausprogramme und spielt in den meisten davon selbst.',
        image_url: 'https://images.example.com/owners/resi-hofbauer.jpg',
        instagram: 'https://instagram.com/resi.hofbauer.example',
      },
      {
        name: 'Jonas Petrović',
        role: 'Impro & Programmplanung',
        bio: 'Leitet das Impro-Ensemble und stellt den Spielplan zusammen.',
        image_url: 'https://images.example.com/owners/jonas-petrovic.jpg',
        website: 'https://jonas-petrovic.example.com',
      },
    ],
    events: [
      {
        title: 'Grantig, aber herzlich',
        description: 'Ein Kabarettabend über Wiener Befindlichkeiten.',
        genre: 'Kabarett',
        date: atUtc(now, today, 19, 30),
        duration_minutes: 90,
        price_eur: 19,
        seats_total: 60,
        seats_available: 60,
        image_url: 'https://images.example.com/events/grantig.jpg',
      },
      {
        title: 'Impro-Match: Publikum gegen Ensemble',
        description: 'Improvisationstheater nach Zurufen aus dem Saal.',
        genre: 'Impro',
        date: atUtc(now, today, 20, 0),
        duration_minutes: 75,
        price_eur: 15,
        seats_total: 60,
        seats_available: 60,
        image_url: 'https://images.example.com/events/impro-match.jpg',
      },
      {
        title: 'Werkstatt: Erste Schritte auf der Bühne',
        description: 'Workshop für alle, die selbst einmal spielen wollen.',
        genre: 'Workshop',
        date: atUtc(now, Math.min(today + 3, 28), 18, 0),
        duration_minutes: 120,
        price_eur: 40,
        seats_total: 20,
        seats_available: 20,
        image_url: 'https://images.example.com/events/werkstatt.jpg',
      },
    ],
    video: {
      month_key: toMonthKey(now),
      video_url: 'https://videos.example.com/loops/buehne-loop-1080p.mp4',
      caption: 'Aus dem aktuellen Programm',
    },
  };
}
