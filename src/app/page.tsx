import Link from 'next/link';
import { listAssessments } from '@/lib/assessments';
import { getAppContext } from '@/lib/http';
import { formatScore } from '@/lib/utils';

export const dynamic = 'force-dynamic';

export default async function HomePage() {
  const { store } = await getAppContext();
  const { assessments, pagination } = await listAssessments(store);

  return (
    <main className="max-w-4xl mx-auto px-4 py-10">
      <h1 className="text-2xl font-bold text-gray-800 mb-6">Assessments</h1>
      {assessments.length === 0 ? (
        <p className="text-gray-500">No assessments yet. Create one with POST /api/assessments.</p>
      ) : (
        <table className="w-full bg-white rounded-xl border border-gray-200 text-sm">
          <thead className="text-left text-gray-500">
            <tr>
              <th className="px-4 py-2">Team</th>
              <th className="px-4 py-2">Status</th>
              <th className="px-4 py-2">Score</th>
              <th className="px-4 py-2">Tier</th>
            </tr>
          </thead>
          <tbody>
            {assessments.map(a => (
              <tr key={a.assessment_id} className="border-t border-gray-100">
                <td className="px-4 py-2">
                  <Link href={`/assessments/${a.assessment_id}/results`} className="text-blue-600 hover:underline">
                    {a.team_name || a.assessment_id}
                  </Link>
                </td>
                <td className="px-4 py-2">{a.status}</td>
                <td className="px-4 py-2 font-mono">{formatScore(a.overall_score, 2)}</td>
                <td className="px-4 py-2">{a.deviq_classification ?? '-'}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
      <p className="mt-4 text-xs text-gray-400">{pagination.total} total</p>
    </main>
  );
}
