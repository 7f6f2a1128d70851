import { describe, it, expect } from 'vitest';
import {
  anomaliesTotal,
  externalApiDurationMs,
  jobDurationMs,
  jobRunsTotal,
  jobsInFlight,
  renderMetrics,
} from '../../../src/infrastructure/metrics';

describe('metrics', () => {
  it('renders counters per label set', () => {
    jobRunsTotal.inc({ job: 'import_upcoming_week', outcome: 'ok' });
    jobRunsTotal.inc({ job: 'import_upcoming_week', outcome: 'ok' });
    jobRunsTotal.inc({ job: 'import_odds_upcoming', outcome: 'skipped' });

    const output = renderMetrics();

    expect(output).toContain('# TYPE atspool_job_runs_total counter');
    expect(output).toContain('atspool_job_runs_total{job="import_upcoming_week",outcome="ok"} 2');
    expect(output).toContain('atspool_job_runs_total{job="import_odds_upcoming",outcome="skipped"} 1');
  });

  it('renders histograms with cumulative buckets', () => {
    externalApiDurationMs.observe({ provider: 'espn', status: 'ok' }, 42);

    const output = renderMetrics();

    expect(output).toContain('# TYPE atspool_external_api_duration_ms histogram');
    expect(output).toContain('atspool_external_api_duration_ms_bucket{provider="espn",status="ok",le="25"} 0');
    expect(output).toContain('atspool_external_api_duration_ms_bucket{provider="espn",status="ok",le="50"} 1');
    expect(output).toContain('atspool_external_api_duration_ms_bucket{provider="espn",status="ok",le="+Inf"} 1');
    expect(output).toContain('atspool_external_api_duration_ms_sum{provider="espn",status="ok"} 42');
  });

  it('uses the job duration buckets', () => {
    jobDurationMs.observe({ job: 'grade_completed_week' }, 20_000);

    expect(renderMetrics()).toContain('atspool_job_duration_ms_bucket{job="grade_completed_week",le="30000"} 1');
  });

  it('tracks in-flight jobs as a gauge', () => {
    jobsInFlight.inc({ job: 'send_deadline_reminders' });
    jobsInFlight.inc({ job: 'send_deadline_reminders' });
    jobsInFlight.dec({ job: 'send_deadline_reminders' });

    const output = renderMetrics();

    expect(output).toContain('# TYPE atspool_jobs_in_flight gauge');
    expect(output).toContain('atspool_jobs_in_flight{job="send_deadline_reminders"} 1');
  });

  it('lists every registered family even before it is used', () => {
    anomaliesTotal.inc({ job: 'import_odds_upcoming', reason: 'DATA_INTEGRITY' });
    const output = renderMetrics();

    for (const family of [
      'atspool_http_requests_total',
      'atspool_http_request_duration_ms',
      'atspool_anomalies_total',
      'atspool_pick_submissions_total',
    ]) {
      expect(output).toContain(`# HELP ${family} `);
    }
  });
});
