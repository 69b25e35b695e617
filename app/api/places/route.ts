import { NextRequest, NextResponse } from 'next/server';
import { createLogger } from '@/lib/logger';
import { getPlacesStore } from '@/lib/places-service';
import { PlacesQuerySchema, toFilterSet, toPlaceDto } from '@/lib/types';
import type { PlacesApiResponse } from '@/lib/types';

// Travel-time ranking waits up to TRAVEL_TIME_TIMEOUT_MS
export const maxDuration = 30;
export const dynamic = 'force-dynamic';

const log = createLogger('API');

export async function GET(request: NextRequest) {
  const startTime = performance.now();
  const parsed = PlacesQuerySchema.safeParse(Object.fromEntries(request.nextUrl.searchParams));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return NextResponse.json(
      { ok: false, error: issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid query' },
      { status: 400 }
    );
  }

  const { lat, lon } = parsed.data;
  const store = getPlacesStore();

  store.refresh(toFilterSet(parsed.data));
  const committed = await store.updateFromLocation({ lat, lon });

  // A later request replaced the store's location and filters before this one committed
  if (!committed) {
    log.debug(`/places: superseded after ${Math.round(performance.now() - startTime)}ms`);
    return NextResponse.json({ ok: false, error: 'Superseded by a newer request' }, { status: 409 });
  }

  const { displayedPlaces } = store.getSnapshot();
  const body: PlacesApiResponse = {
    ok: true,
    count: displayedPlaces.length,
    places: displayedPlaces.map(toPlaceDto),
  };

  log.debug(`/places: ${Math.round(performance.now() - startTime)}ms, displayed=${body.count}`);
  return NextResponse.json(body);
}
